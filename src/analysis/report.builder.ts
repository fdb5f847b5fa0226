/**
 * Report Construction
 *
 * Turns aggregated buckets into the frozen report handed to renderers.
 */

import type {
    EmojiCount,
    HourStats,
    MonthStats,
    OverallStats,
    Report,
    SenderStats,
    WordCount
} from '../types';
import { AVERAGE_DAYS_PER_MONTH, DEFAULT_TOP_EMOJIS } from '../utils/constants';
import { formatMonthLabel } from '../utils/date.utils';
import type { AggregateSnapshot, Bucket } from './chat.aggregator';
import type { WordFrequencyTable } from './word-frequency';

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Division that yields 0 instead of NaN or Infinity
 */
export function safeDivide(numerator: number, denominator: number): number {
    return denominator > 0 ? numerator / denominator : 0;
}

function topWords(table: WordFrequencyTable, limit: number): WordCount[] {
    return table.top(limit).map(({ key, count }) => ({ word: key, count }));
}

function topEmojis(table: WordFrequencyTable, limit: number): EmojiCount[] {
    return table.top(limit).map(({ key, count }) => ({ emoji: key, count }));
}

/**
 * Sorts by message count, highest first. Ties keep the incoming order.
 */
function byMessagesDescending<T extends { messages: number }>(items: T[]): T[] {
    return [...items].sort((a, b) => b.messages - a.messages);
}

export function deepFreeze(value: unknown): void {
    if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
        return;
    }
    Object.freeze(value);
    for (const child of Object.values(value)) {
        deepFreeze(child);
    }
}

// ============================================================================
// SELECTION
// ============================================================================

/**
 * Hour with the most messages; the earliest hour wins a tie
 */
export function selectPeakHour(hours: ReadonlyMap<number, Bucket>): { hour: number; messages: number } | null {
    let peak: { hour: number; messages: number } | null = null;

    for (const hour of Array.from(hours.keys()).sort((a, b) => a - b)) {
        const messages = hours.get(hour)?.messages ?? 0;
        if (!peak || messages > peak.messages) {
            peak = { hour, messages };
        }
    }

    return peak;
}

/**
 * Sender with the most messages; whoever appeared first in the transcript
 * wins a tie
 */
export function selectMostActiveSender(senders: ReadonlyMap<string, Bucket>): { name: string; messages: number } | null {
    let best: { name: string; messages: number } | null = null;

    for (const [name, bucket] of senders) {
        if (!best || bucket.messages > best.messages) {
            best = { name, messages: bucket.messages };
        }
    }

    return best;
}

// ============================================================================
// REPORT
// ============================================================================

export function buildReport(snapshot: AggregateSnapshot): Report {
    const { overall, options } = snapshot;
    const limit = options.topWordsLimit;

    const totalMonths = snapshot.months.size;
    const totalDays = totalMonths * AVERAGE_DAYS_PER_MONTH;

    const overallStats: OverallStats = {
        totalMessages: overall.messages,
        totalWords: overall.words,
        totalEmojis: overall.emojis,
        totalMonths,
        totalDays,
        totalSenders: snapshot.senders.size,
        avgMessagesPerMonth: safeDivide(overall.messages, totalMonths),
        avgWordsPerMonth: safeDivide(overall.words, totalMonths),
        avgMessagesPerDay: safeDivide(overall.messages, totalDays),
        avgWordsPerDay: safeDivide(overall.words, totalDays),
        topWords: topWords(overall.frequencies, limit),
        topEmojis: topEmojis(snapshot.emojis, DEFAULT_TOP_EMOJIS),
        peakHour: selectPeakHour(snapshot.hours),
        mostActiveSender: selectMostActiveSender(snapshot.senders)
    };

    const monthKeys = Array.from(snapshot.months.keys()).sort();

    const senders: SenderStats[] = byMessagesDescending(
        Array.from(snapshot.senders, ([name, bucket]) => {
            const perMonth = snapshot.senderMonths.get(name);
            return {
                name,
                messages: bucket.messages,
                words: bucket.words,
                emojis: bucket.emojis,
                avgWordsPerMessage: safeDivide(bucket.words, bucket.messages),
                messageShare: safeDivide(bucket.messages, overall.messages) * 100,
                topWords: topWords(bucket.frequencies, limit),
                months: monthKeys.flatMap(month => {
                    const monthBucket = perMonth?.get(month);
                    return monthBucket
                        ? [{ month, messages: monthBucket.messages, words: monthBucket.words }]
                        : [];
                })
            };
        })
    );

    const hours: HourStats[] = Array.from(snapshot.hours.keys())
        .sort((a, b) => a - b)
        .flatMap(hour => {
            const bucket = snapshot.hours.get(hour);
            return bucket
                ? [{ hour, messages: bucket.messages, words: bucket.words, topWords: topWords(bucket.frequencies, limit) }]
                : [];
        });

    const months: MonthStats[] = monthKeys.flatMap(month => {
        const bucket = snapshot.months.get(month);
        if (!bucket) {
            return [];
        }

        const monthSenders = Array.from(snapshot.senderMonths).flatMap(([name, perMonth]) => {
            const senderBucket = perMonth.get(month);
            return senderBucket ? [{ name, messages: senderBucket.messages }] : [];
        });

        return [{
            month,
            label: formatMonthLabel(month),
            messages: bucket.messages,
            words: bucket.words,
            emojis: bucket.emojis,
            avgWordsPerMessage: safeDivide(bucket.words, bucket.messages),
            topWords: topWords(bucket.frequencies, limit),
            senders: byMessagesDescending(monthSenders)
        }];
    });

    const report: Report = {
        overall: overallStats,
        senders,
        hours,
        months,
        lines: snapshot.lines,
        options: {
            useStopwords: options.useStopwords,
            systemNotices: options.systemNotices,
            continuationLines: options.continuationLines,
            topWordsLimit: options.topWordsLimit
        }
    };

    deepFreeze(report);
    return report;
}
