/**
 * CLI Utilities for enhanced user experience
 */

import fs from 'node:fs';
import path from 'node:path';
import * as readline from 'node:readline';
import { discoverTranscriptFiles } from '../utils/file.utils';

// ============================================================================
// ASCII ART & BRANDING
// ============================================================================

export const ASCII_LOGO = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║          ┌─┐┬ ┬┌─┐┌┬┐  ┌─┐┌┬┐┌─┐┌┬┐┌─┐                     ║
║          │  ├─┤├─┤ │   └─┐ │ ├─┤ │ └─┐                     ║
║          └─┘┴ ┴┴ ┴ ┴   └─┘ ┴ ┴ ┴ ┴ └─┘                     ║
║                                                            ║
║          Transcript Word Frequency & Activity              ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    white: '\x1b[37m',
    gray: '\x1b[90m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

// ============================================================================
// PROGRESS
// ============================================================================

export class ProgressBar {
    private total: number;
    private current: number = 0;
    private width: number = 40;
    private message: string;

    constructor(total: number, message: string = '') {
        this.total = total;
        this.message = message;
    }

    increment(message?: string): void {
        this.current++;
        if (message) this.message = message;
        this.render();
    }

    private render(): void {
        const ratio = this.total > 0 ? this.current / this.total : 1;
        const percentage = Math.round(ratio * 100);
        const filled = Math.round(ratio * this.width);
        const bar = '█'.repeat(filled) + '░'.repeat(this.width - filled);

        process.stdout.write(`\r${colorize('Progress:', 'blue')} [${bar}] ${percentage}% (${this.current}/${this.total}) ${this.message}`);

        if (this.current >= this.total) {
            process.stdout.write('\n');
        }
    }
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

export function formatTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');
    const lines: string[] = [];

    lines.push(`┌─${separator}─┐`);
    lines.push(`│ ${headerRow} │`);
    lines.push(`├─${separator}─┤`);

    data.forEach(row => {
        const formattedRow = columns.map((col, i) => {
            const cell = row[i] ?? '';
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart(Math.floor((col.width + truncated.length) / 2)).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    });

    lines.push(`└─${separator}─┘`);
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of formatTable(columns, data)) {
        console.log(line);
    }
}

// ============================================================================
// USAGE HELPER
// ============================================================================

export function showUsage(): void {
    console.log(ASCII_LOGO);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('npm start --', 'cyan')} ${colorize('[options]', 'yellow')} ${colorize('<transcript.txt | folder>', 'yellow')} ${colorize('[output_dir]', 'dim')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--interactive, -i', 'cyan')}       Launch interactive mode (default if no arguments)`);
    console.log(`  ${colorize('--stopwords', 'cyan')}             Drop common English words from word rankings`);
    console.log(`  ${colorize('--include-notices', 'cyan')}       Count "<Media omitted>" and edit/delete notices as messages`);
    console.log(`  ${colorize('--discard-continuations', 'cyan')} Drop wrapped lines instead of joining them to the message`);
    console.log(`  ${colorize('--top <n>', 'cyan')}               Number of top words per section (default: 10)`);
    console.log(`  ${colorize('--encoding <name>', 'cyan')}       Transcript encoding (default: utf8)`);
    console.log(`  ${colorize('--quiet, -q', 'cyan')}             Skip printing the full report`);
    console.log(`  ${colorize('--help, -h', 'cyan')}              Show this help message`);
    console.log();

    console.log(`${colorize('ARGUMENTS:', 'bright')}`);
    console.log(`  ${colorize('transcript', 'yellow')}     Exported chat .txt file, or a folder of them`);
    console.log(`  ${colorize('output_dir', 'dim')}     Where results are written (default: ./output)`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('npm start -- chat.txt', 'cyan')}                         # Analyse one transcript`);
    console.log(`  ${colorize('npm start -- --stopwords chat.txt results/', 'cyan')}    # Filter stopwords, custom output`);
    console.log(`  ${colorize('npm start -- ./exports/', 'cyan')}                       # Analyse every .txt in a folder`);
    console.log();

    console.log(`${colorize('INPUT FORMAT:', 'bright')}`);
    console.log(`  ${colorize('M/D/YY, H:MM - Name: message', 'green')}`);
    console.log(`  ${colorize('M/D/YYYY, H:MM - Name: message', 'green')}`);
    console.log();

    console.log(`${colorize('OUTPUT:', 'bright')}`);
    console.log(`  ${colorize('<name>_analysis_results.txt', 'cyan')}   Text report`);
    console.log(`  ${colorize('<name>_analysis.json', 'cyan')}          Report data and chart series`);
    console.log();
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}

// ============================================================================
// INTERACTIVE CLI UTILITIES
// ============================================================================

export function createReadlineInterface(): readline.Interface {
    return readline.createInterface({
        input: process.stdin,
        output: process.stdout
    });
}

export function askQuestion(rl: readline.Interface, question: string): Promise<string> {
    return new Promise((resolve) => {
        rl.question(`${colorize('?', 'cyan')} ${question}`, (answer) => {
            resolve(answer.trim());
        });
    });
}

export function askChoice(rl: readline.Interface, question: string, choices: string[]): Promise<string> {
    return new Promise((resolve) => {
        console.log(`\n${colorize(question, 'bright')}`);
        choices.forEach((choice, index) => {
            console.log(`  ${colorize((index + 1).toString(), 'cyan')}. ${choice}`);
        });

        rl.question(`\n${colorize('?', 'cyan')} Enter your choice (1-${choices.length}): `, (answer) => {
            const choiceIndex = parseInt(answer.trim(), 10) - 1;
            const selected = choices[choiceIndex];
            if (selected !== undefined) {
                resolve(selected);
            } else {
                console.log(`${colorize('Invalid choice. Please try again.', 'red')}`);
                resolve(askChoice(rl, question, choices));
            }
        });
    });
}

export function showMainMenu(): void {
    console.log(`\n${colorize('MAIN MENU', 'bright')}`);
    console.log(`${colorize('═'.repeat(50), 'cyan')}`);
    console.log(`${colorize('1.', 'cyan')} Analyse a transcript file or folder`);
    console.log(`${colorize('2.', 'cyan')} Show usage information`);
    console.log(`${colorize('3.', 'cyan')} Exit`);
    console.log(`${colorize('═'.repeat(50), 'cyan')}`);
}

export function showAnalysisPreview(targetPath: string): void {
    console.log(`\n${colorize('ANALYSIS PREVIEW', 'bright')}`);
    console.log(`${colorize('═'.repeat(50), 'cyan')}`);
    console.log(`${colorize('Target:', 'cyan')} ${targetPath}`);

    if (!fs.existsSync(targetPath)) {
        console.log(`${colorize('Path does not exist.', 'red')}`);
        return;
    }

    const files = fs.statSync(targetPath).isDirectory() ? discoverTranscriptFiles(targetPath) : [targetPath];
    const totalSize = files.reduce((sum, file) => sum + fs.statSync(file).size, 0);

    console.log(`${colorize('Transcripts:', 'cyan')} ${files.length}`);
    for (const file of files.slice(0, 10)) {
        console.log(`  ${colorize(path.basename(file), 'green')}`);
    }
    if (files.length > 10) {
        console.log(`  ${colorize(`... and ${files.length - 10} more`, 'dim')}`);
    }
    console.log(`${colorize('Total Size:', 'cyan')} ${formatBytes(totalSize)}`);
    console.log(`${colorize('═'.repeat(50), 'cyan')}`);
}
