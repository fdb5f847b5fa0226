/**
 * Chat Aggregator
 */

import type {
    AnalysisOptions,
    LineStats,
    MonthKey,
    ParsedMessage,
    Report,
    ResolvedAnalysisOptions
} from '../types';
import { toMonthKey } from '../utils/date.utils';
import { extractEmojis, tokeniseWords } from '../utils/text.utils';
import { createLineStats } from '../parsers/transcript.parser';
import { resolveAnalysisOptions } from './options.resolver';
import { WordFrequencyTable } from './word-frequency';
import { buildReport } from './report.builder';

// ============================================================================
// BUCKETS
// ============================================================================

export type Bucket = {
    messages: number;
    words: number;
    emojis: number;
    frequencies: WordFrequencyTable;
};

export function createBucket(): Bucket {
    return { messages: 0, words: 0, emojis: 0, frequencies: new WordFrequencyTable() };
}

function mergeBucket(target: Bucket, source: Bucket): void {
    target.messages += source.messages;
    target.words += source.words;
    target.emojis += source.emojis;
    target.frequencies.merge(source.frequencies);
}

function bucketFor<K>(buckets: Map<K, Bucket>, key: K): Bucket {
    let bucket = buckets.get(key);
    if (!bucket) {
        bucket = createBucket();
        buckets.set(key, bucket);
    }
    return bucket;
}

/**
 * Everything the report builder reads. Maps keep first-seen order.
 */
export type AggregateSnapshot = {
    overall: Bucket;
    months: ReadonlyMap<MonthKey, Bucket>;
    senders: ReadonlyMap<string, Bucket>;
    hours: ReadonlyMap<number, Bucket>;
    senderMonths: ReadonlyMap<string, ReadonlyMap<MonthKey, Bucket>>;
    emojis: WordFrequencyTable;
    lines: LineStats;
    options: ResolvedAnalysisOptions;
};

// ============================================================================
// AGGREGATOR
// ============================================================================

/**
 * Folds parsed messages into month, sender and hour buckets.
 *
 * One instance per analysis run. Partial aggregators built over consecutive
 * slices of a transcript can be combined with `merge`.
 */
export class ChatAggregator {
    readonly options: ResolvedAnalysisOptions;

    private overall = createBucket();
    private months = new Map<MonthKey, Bucket>();
    private senders = new Map<string, Bucket>();
    private hours = new Map<number, Bucket>();
    private senderMonths = new Map<string, Map<MonthKey, Bucket>>();
    private emojis = new WordFrequencyTable();
    private lines: LineStats = createLineStats();

    constructor(options: AnalysisOptions = {}) {
        this.options = resolveAnalysisOptions(options);
    }

    add(message: ParsedMessage): void {
        // notices count as messages but carry no text worth analysing
        const tokens = message.isSystemNotice ? [] : tokeniseWords(message.body, this.options);
        const emojis = message.isSystemNotice ? [] : extractEmojis(message.body);
        const monthKey = toMonthKey(message.timestamp.date);

        let perMonth = this.senderMonths.get(message.sender);
        if (!perMonth) {
            perMonth = new Map();
            this.senderMonths.set(message.sender, perMonth);
        }

        const buckets = [
            this.overall,
            bucketFor(this.months, monthKey),
            bucketFor(this.senders, message.sender),
            bucketFor(this.hours, message.timestamp.hour),
            bucketFor(perMonth, monthKey)
        ];

        for (const bucket of buckets) {
            bucket.messages += 1;
            bucket.words += tokens.length;
            bucket.emojis += emojis.length;
            bucket.frequencies.addAll(tokens);
        }

        this.emojis.addAll(emojis);
    }

    addAll(messages: Iterable<ParsedMessage>): void {
        for (const message of messages) {
            this.add(message);
        }
    }

    recordLines(stats: LineStats): void {
        this.lines.totalLines += stats.totalLines;
        this.lines.blankLines += stats.blankLines;
        this.lines.messageLines += stats.messageLines;
        this.lines.continuationLines += stats.continuationLines;
        this.lines.discardedLines += stats.discardedLines;
        this.lines.systemNoticeLines += stats.systemNoticeLines;
    }

    /**
     * Adds the other aggregator's buckets into this one. Keys first seen in
     * `other` rank after keys already present here.
     */
    merge(other: ChatAggregator): this {
        mergeBucket(this.overall, other.overall);

        for (const [key, bucket] of other.months) mergeBucket(bucketFor(this.months, key), bucket);
        for (const [key, bucket] of other.senders) mergeBucket(bucketFor(this.senders, key), bucket);
        for (const [key, bucket] of other.hours) mergeBucket(bucketFor(this.hours, key), bucket);

        for (const [sender, otherMonths] of other.senderMonths) {
            let perMonth = this.senderMonths.get(sender);
            if (!perMonth) {
                perMonth = new Map();
                this.senderMonths.set(sender, perMonth);
            }
            for (const [key, bucket] of otherMonths) mergeBucket(bucketFor(perMonth, key), bucket);
        }

        this.emojis.merge(other.emojis);
        this.recordLines(other.lines);
        return this;
    }

    get totalMessages(): number {
        return this.overall.messages;
    }

    snapshot(): AggregateSnapshot {
        return {
            overall: this.overall,
            months: this.months,
            senders: this.senders,
            hours: this.hours,
            senderMonths: this.senderMonths,
            emojis: this.emojis,
            lines: { ...this.lines },
            options: this.options
        };
    }

    buildReport(): Report {
        return buildReport(this.snapshot());
    }
}
