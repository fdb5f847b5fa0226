import fs from "node:fs";
import path from "node:path";
import type * as readline from 'node:readline';
import type { AnalysisOptions } from '../types';
import { getDefaultOutputDir } from './output';
import { runAnalysis } from './analysis.runner';
import {
    ASCII_LOGO,
    colorize,
    logError,
    logHeader,
    logInfo,
    showUsage,
    createReadlineInterface,
    askQuestion,
    askChoice,
    showMainMenu,
    showAnalysisPreview
} from './cli.utils';

// ============================================================================
// INTERACTIVE CLI MAIN LOGIC
// ============================================================================

/**
 * Interactive CLI execution function
 */
export async function runInteractiveCLI(): Promise<void> {
    const rl = createReadlineInterface();

    try {
        console.log(ASCII_LOGO);

        logInfo("Welcome to interactive mode!");
        logInfo("Point it at an exported chat transcript (.txt) or a folder of them.");

        while (true) {
            showMainMenu();

            const choice = await askQuestion(rl, "Enter your choice (1-3): ");

            let shouldExit = false;

            switch (choice) {
                case '1':
                    shouldExit = !(await handleTranscriptAnalysis(rl));
                    break;
                case '2':
                    showUsage();
                    await askQuestion(rl, "\nPress Enter to continue...");
                    break;
                case '3':
                    console.log(`\n${colorize('Goodbye!', 'green')}`);
                    shouldExit = true;
                    break;
                default:
                    logError("Invalid choice. Please enter a number between 1 and 3.");
            }

            if (shouldExit) {
                rl.close();
                return;
            }
        }

    } catch (error) {
        logError("An unexpected error occurred");
        console.log(`${colorize('Details:', 'dim')} ${error instanceof Error ? error.message : String(error)}`);
        rl.close();
        process.exit(1);
    }
}

/**
 * Asks for a transcript and analysis settings, then runs the analysis.
 * Returns false when the user wants to leave.
 */
async function handleTranscriptAnalysis(rl: readline.Interface): Promise<boolean> {
    logHeader("TRANSCRIPT ANALYSIS");

    const inputPath = await askQuestion(rl, "Enter the path to a transcript file or folder: ");

    if (!inputPath) {
        logError("No path provided.");
        return true;
    }

    const resolvedPath = path.resolve(inputPath);

    if (!fs.existsSync(resolvedPath)) {
        logError(`Path does not exist: ${resolvedPath}`);
        return true;
    }

    showAnalysisPreview(resolvedPath);

    const options: AnalysisOptions = {};

    const stopwords = await askChoice(rl, "Filter common English words from rankings?", ['No', 'Yes']);
    options.useStopwords = stopwords === 'Yes';

    const notices = await askChoice(rl, "How should \"<Media omitted>\" and edit/delete notices be treated?", [
        'Exclude them entirely',
        'Count them as messages (never as words)'
    ]);
    options.systemNotices = notices.startsWith('Count') ? 'include' : 'exclude';

    const continuations = await askChoice(rl, "Lines that wrap onto a new line without a timestamp:", [
        'Join them to the previous message',
        'Discard them'
    ]);
    options.continuationLines = continuations.startsWith('Discard') ? 'discard' : 'join';

    const outputArg = await askQuestion(rl, "Output directory (Enter for ./output): ");

    const confirm = await askQuestion(rl, "Do you want to proceed with the analysis? (y/N): ");

    if (confirm.toLowerCase() !== 'y' && confirm.toLowerCase() !== 'yes') {
        logInfo("Analysis cancelled.");
        return true;
    }

    try {
        runAnalysis({
            inputPath: resolvedPath,
            outputDir: getDefaultOutputDir(outputArg || undefined),
            options
        });
    } catch (error) {
        logError("Error processing transcript");
        console.log(`${colorize('Details:', 'dim')} ${error instanceof Error ? error.message : String(error)}`);
    }

    console.log();
    const continueChoice = await askQuestion(rl, "Would you like to run another analysis? (y/N): ");

    if (continueChoice.toLowerCase() === 'y' || continueChoice.toLowerCase() === 'yes') {
        console.log();
        logInfo("Returning to main menu...");
        return true;
    }

    console.log();
    logInfo("Goodbye!");
    return false;
}
