import fs from "node:fs";
import path from "node:path";
import type { AnalysisOptions, Report } from '../types';
import { discoverTranscriptFiles } from '../utils/file.utils';
import { COMBINED_REPORT_NAME } from '../utils/constants';
import { renderSummaryLines, renderTextReport } from '../report/text-report.renderer';
import { formatHourlyHistogram, formatNumber } from '../report/format.utils';
import { generateChartSeries } from '../analysis/time-series.generator';
import { analyseTranscriptFiles, TranscriptSourceError, writeAnalysisOutputs } from './file-processor';
import {
    colorize,
    createTable,
    formatBytes,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    ProgressBar
} from './cli.utils';

// ============================================================================
// ANALYSIS RUN
// ============================================================================

export type AnalysisRunConfig = {
    inputPath: string;
    outputDir: string;
    options: AnalysisOptions;
    encoding?: string;
    quiet?: boolean;
};

export type AnalysisRunResult = {
    reports: Array<{ name: string; report: Report }>;
    writtenFiles: string[];
};

/**
 * Reads the transcript (or every transcript in a folder), prints the
 * reports and writes the result files
 */
export function runAnalysis(config: AnalysisRunConfig): AnalysisRunResult {
    const inputPath = path.resolve(config.inputPath);

    if (!fs.existsSync(inputPath)) {
        throw new TranscriptSourceError(`Input path does not exist: ${inputPath}`, inputPath);
    }

    // Step 1: Discover transcripts
    logHeader("DISCOVERING TRANSCRIPTS");
    const isDirectory = fs.statSync(inputPath).isDirectory();
    // earlier results may sit inside the input folder
    const files = isDirectory ? discoverTranscriptFiles(inputPath, [config.outputDir]) : [inputPath];

    if (files.length === 0) {
        logWarning("No transcript files found");
        logInfo("Looking for: .txt chat exports");
        return { reports: [], writtenFiles: [] };
    }

    logSuccess(`Found ${formatNumber(files.length)} transcript file(s)`);
    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'File', width: 40, align: 'left' },
            { header: 'Size', width: 10, align: 'right' }
        ],
        files.map((file, index) => [
            (index + 1).toString(),
            isDirectory ? path.relative(inputPath, file) : path.basename(file),
            formatBytes(fs.statSync(file).size)
        ])
    );

    // Step 2: Parse and aggregate
    logHeader("ANALYSING TRANSCRIPTS");
    const progress = new ProgressBar(files.length, 'Parsing...');
    const { analyses, failures, combined } = analyseTranscriptFiles(
        files,
        config.options,
        config.encoding,
        analysis => progress.increment(path.basename(analysis.filePath))
    );
    for (const failure of failures) {
        progress.increment(path.basename(failure.filePath));
    }
    if (failures.length > 0) {
        logWarning(`${formatNumber(failures.length)} transcript(s) could not be read`);
    }

    const reports = analyses.map(analysis => ({ name: analysis.baseName, report: analysis.report }));
    if (analyses.length > 1) {
        reports.push({ name: COMBINED_REPORT_NAME, report: combined });
    }

    // Step 3: Print and write outputs
    const writtenFiles: string[] = [];
    for (const { name, report } of reports) {
        logHeader(`REPORT: ${name}`);

        const { lines } = report;
        logInfo(
            `${formatNumber(lines.totalLines)} lines: ${formatNumber(lines.messageLines)} messages, ` +
            `${formatNumber(lines.continuationLines)} continuations, ${formatNumber(lines.discardedLines)} discarded, ` +
            `${formatNumber(lines.systemNoticeLines)} system notices`
        );

        if (report.overall.totalMessages === 0) {
            logWarning("No messages matched the expected \"M/D/YY, H:MM - Name: message\" format");
        }

        if (!config.quiet) {
            console.log();
            for (const line of renderTextReport(report, { style: 'console' })) {
                console.log(line);
            }
            printHourlyChart(report);
        }

        const paths = writeAnalysisOutputs(report, config.outputDir, name);
        writtenFiles.push(paths.resultsPath, paths.jsonPath);
        logSuccess(`Results written: ${paths.resultsPath} (${formatBytes(fs.statSync(paths.resultsPath).size)})`);
        logSuccess(`JSON analysis written: ${paths.jsonPath} (${formatBytes(fs.statSync(paths.jsonPath).size)})`);
    }

    // Final summary
    const summaryReport = analyses.length > 1 ? combined : analyses[0]?.report;
    if (summaryReport) {
        logHeader("ANALYSIS COMPLETE");
        console.log(`${colorize('Summary:', 'bright')}`);
        for (const line of renderSummaryLines(summaryReport)) {
            const [label, ...rest] = line.split(': ');
            console.log(`  ${colorize(`${label}:`, 'cyan')} ${rest.join(': ')}`);
        }
        console.log();
    }

    return { reports, writtenFiles };
}

/**
 * Draws messages per hour as a text bar chart
 */
function printHourlyChart(report: Report): void {
    if (report.hours.length === 0) {
        return;
    }

    const histogram = formatHourlyHistogram(generateChartSeries(report).hourlyHistogram);
    const max = Math.max(...histogram.map(entry => entry.count));

    console.log();
    console.log(colorize('Hourly distribution:', 'bright'));
    createTable(
        [
            { header: 'Hour', width: 5, align: 'left' },
            { header: 'Messages', width: 8, align: 'right' },
            { header: 'Share', width: 6, align: 'right' },
            { header: '', width: 30, align: 'left' }
        ],
        histogram.map(entry => [
            entry.hour,
            formatNumber(entry.count),
            `${entry.percentage.toFixed(1)}%`,
            '█'.repeat(max > 0 ? Math.round(entry.count / max * 30) : 0)
        ])
    );
}
