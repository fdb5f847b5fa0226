import type { AnalysisOptions } from '../types';
import { getDefaultOutputDir } from './output';
import { runAnalysis } from './analysis.runner';
import { ASCII_LOGO, colorize, logError, showError, showUsage } from './cli.utils';
import { runInteractiveCLI } from './interactive';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

export type CliArgs =
    | { mode: 'interactive' }
    | { mode: 'help' }
    | {
        mode: 'analyse';
        inputPath: string;
        outputDir?: string;
        options: AnalysisOptions;
        encoding: string;
        quiet: boolean;
    };

/**
 * Parses the arguments that follow the script name
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const options: AnalysisOptions = {};
    const positional: string[] = [];
    let encoding = 'utf8';
    let quiet = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case '--help':
            case '-h':
                return { mode: 'help' };
            case '--interactive':
            case '-i':
                return { mode: 'interactive' };
            case '--stopwords':
                options.useStopwords = true;
                break;
            case '--include-notices':
                options.systemNotices = 'include';
                break;
            case '--discard-continuations':
                options.continuationLines = 'discard';
                break;
            case '--quiet':
            case '-q':
                quiet = true;
                break;
            case '--top': {
                const value = argv[++i];
                const limit = value === undefined ? NaN : Number(value);
                if (!Number.isInteger(limit) || limit < 1) {
                    throw new CliUsageError(`--top expects a positive whole number, got "${value ?? ''}"`);
                }
                options.topWordsLimit = limit;
                break;
            }
            case '--encoding': {
                const value = argv[++i];
                if (!value) {
                    throw new CliUsageError('--encoding expects an encoding name');
                }
                encoding = value;
                break;
            }
            default:
                if (arg.startsWith('-')) {
                    throw new CliUsageError(`Unknown option: ${arg}`);
                }
                positional.push(arg);
        }
    }

    const [inputPath, outputDir, ...extra] = positional;
    if (!inputPath) {
        return { mode: 'interactive' };
    }
    if (extra.length > 0) {
        throw new CliUsageError(`Unexpected arguments: ${extra.join(' ')}`);
    }

    return { mode: 'analyse', inputPath, outputDir, options, encoding, quiet };
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function
 */
export async function runCLI(args: string[]): Promise<void> {
    let parsed: CliArgs;
    try {
        parsed = parseCliArgs(args.slice(2));
    } catch (error) {
        showError("Invalid arguments", error instanceof Error ? error.message : String(error));
        process.exit(1);
    }

    if (parsed.mode === 'interactive') {
        await runInteractiveCLI();
        return;
    }

    if (parsed.mode === 'help') {
        showUsage();
        return;
    }

    console.log(ASCII_LOGO);

    try {
        runAnalysis({
            inputPath: parsed.inputPath,
            outputDir: getDefaultOutputDir(parsed.outputDir),
            options: parsed.options,
            encoding: parsed.encoding,
            quiet: parsed.quiet
        });
    } catch (error) {
        logError("Error processing transcript");
        console.log(`${colorize('Details:', 'dim')} ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}
