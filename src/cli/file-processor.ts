import fs from "node:fs";
import * as iconv from 'iconv-lite';
import type { AnalysisOptions, Report } from '../types';
import { ChatAggregator } from '../analysis/chat.aggregator';
import { generateChartSeries } from '../analysis/time-series.generator';
import { splitTranscriptLines } from '../analysis/transcript.analyser';
import { parseTranscript } from '../parsers/transcript.parser';
import { renderTextReport } from '../report/text-report.renderer';
import { toOutputBaseName, toUniqueOutputBaseNames } from '../utils/file.utils';
import { logError } from './cli.utils';
import { getOutputPaths, type OutputPaths } from './output';

// ============================================================================
// ERRORS
// ============================================================================

/**
 * The transcript could not be read: missing, unreadable or in an unknown
 * encoding
 */
export class TranscriptSourceError extends Error {
    readonly filePath: string;

    constructor(message: string, filePath: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TranscriptSourceError';
        this.filePath = filePath;
    }
}

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * Reads a transcript and splits it into lines. The bytes are decoded with
 * iconv-lite, which also drops a leading byte order mark.
 */
export function readTranscriptLines(filePath: string, encoding: string = 'utf8'): string[] {
    if (!iconv.encodingExists(encoding)) {
        throw new TranscriptSourceError(`Unknown encoding: ${encoding}`, filePath);
    }

    let buffer: Buffer;
    try {
        buffer = fs.readFileSync(filePath);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TranscriptSourceError(`Cannot read transcript: ${reason}`, filePath, { cause: error });
    }

    return splitTranscriptLines(iconv.decode(buffer, encoding));
}

export type TranscriptAnalysis = {
    filePath: string;
    baseName: string;
    aggregator: ChatAggregator;
    report: Report;
};

/**
 * Reads and analyses one transcript file
 */
export function analyseTranscriptFile(
    filePath: string,
    options: AnalysisOptions = {},
    encoding?: string,
    baseName: string = toOutputBaseName(filePath)
): TranscriptAnalysis {
    const lines = readTranscriptLines(filePath, encoding);
    const aggregator = new ChatAggregator(options);
    const parsed = parseTranscript(lines, aggregator.options);

    aggregator.addAll(parsed.messages);
    aggregator.recordLines(parsed.lines);

    return {
        filePath,
        baseName,
        aggregator,
        report: aggregator.buildReport()
    };
}

export type TranscriptFailure = {
    filePath: string;
    error: TranscriptSourceError;
};

/**
 * Analyses several transcripts and folds them into one combined report.
 * Each analysis gets an output name no other file in the batch shares.
 * A file that cannot be read is logged and skipped.
 */
export function analyseTranscriptFiles(
    filePaths: string[],
    options: AnalysisOptions = {},
    encoding?: string,
    onProgress?: (analysis: TranscriptAnalysis) => void
): { analyses: TranscriptAnalysis[]; failures: TranscriptFailure[]; combined: Report } {
    const analyses: TranscriptAnalysis[] = [];
    const failures: TranscriptFailure[] = [];
    const combined = new ChatAggregator(options);
    const baseNames = toUniqueOutputBaseNames(filePaths);

    filePaths.forEach((filePath, index) => {
        let analysis: TranscriptAnalysis;
        try {
            analysis = analyseTranscriptFile(filePath, options, encoding, baseNames[index]);
        } catch (error) {
            if (!(error instanceof TranscriptSourceError)) {
                throw error;
            }
            logError(`Skipping ${filePath}: ${error.message}`);
            failures.push({ filePath, error });
            return;
        }

        combined.merge(analysis.aggregator);
        analyses.push(analysis);
        onProgress?.(analysis);
    });

    return { analyses, failures, combined: combined.buildReport() };
}

/**
 * Writes the plain-text results file and the JSON analysis (report plus
 * chart series) for one report
 */
export function writeAnalysisOutputs(report: Report, outputDir: string, baseName: string): OutputPaths {
    const paths = getOutputPaths(outputDir, baseName);
    fs.mkdirSync(outputDir, { recursive: true });

    const text = renderTextReport(report, { style: 'file' }).join('\n') + '\n';
    fs.writeFileSync(paths.resultsPath, text, "utf8");

    const jsonOutput = {
        ...report,
        series: generateChartSeries(report)
    };
    fs.writeFileSync(paths.jsonPath, JSON.stringify(jsonOutput, null, 2), "utf8");

    return paths;
}

