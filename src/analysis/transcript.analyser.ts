import type { AnalysisOptions, Report } from '../types';
import { parseTranscript } from '../parsers/transcript.parser';
import { ChatAggregator } from './chat.aggregator';
import { resolveAnalysisOptions } from './options.resolver';

// ============================================================================
// ANALYSIS PIPELINE
// ============================================================================

/**
 * Runs the whole pipeline over an ordered sequence of lines:
 * classify, parse, filter notices, tokenise, aggregate.
 *
 * Pure; never throws on malformed input. An empty or fully unparsable
 * transcript produces a zero-valued report.
 */
export function analyseTranscript(lines: Iterable<string>, options: AnalysisOptions = {}): Report {
    const resolved = resolveAnalysisOptions(options);
    const parsed = parseTranscript(lines, resolved);

    const aggregator = new ChatAggregator(resolved);
    aggregator.addAll(parsed.messages);
    aggregator.recordLines(parsed.lines);

    return aggregator.buildReport();
}

/**
 * Splits raw transcript text into lines, dropping the line endings
 */
export function splitTranscriptLines(text: string): string[] {
    return text.split(/\r?\n/);
}

export function analyseTranscriptText(text: string, options: AnalysisOptions = {}): Report {
    return analyseTranscript(splitTranscriptLines(text), options);
}
