import path from "node:path";
import { DEFAULT_OUTPUT_DIR } from '../utils/constants';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export type OutputPaths = {
    resultsPath: string;
    jsonPath: string;
};

/**
 * Resolves the output directory, defaulting to ./output
 */
export function getDefaultOutputDir(outputArg?: string, cwd: string = process.cwd()): string {
    return path.resolve(cwd, outputArg ?? DEFAULT_OUTPUT_DIR);
}

/**
 * Names of the files written for one transcript
 */
export function getOutputPaths(outputDir: string, baseName: string): OutputPaths {
    return {
        resultsPath: path.join(outputDir, `${baseName}_analysis_results.txt`),
        jsonPath: path.join(outputDir, `${baseName}_analysis.json`)
    };
}
