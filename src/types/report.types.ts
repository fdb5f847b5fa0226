/**
 * Report Type Definitions
 *
 * The report is the terminal artifact of one analysis run. Renderers read it,
 * nothing writes to it.
 */

import type { LineStats } from './message.types';
import type { ContinuationPolicy, SystemNoticePolicy } from './options.types';

/**
 * "YYYY-MM"
 */
export type MonthKey = string;

export type WordCount = { word: string; count: number };

export type EmojiCount = { emoji: string; count: number };

export type OverallStats = {
    totalMessages: number;
    totalWords: number;
    totalEmojis: number;
    totalMonths: number;
    totalDays: number;          // totalMonths * 30.4, an approximation
    totalSenders: number;
    avgMessagesPerMonth: number;
    avgWordsPerMonth: number;
    avgMessagesPerDay: number;
    avgWordsPerDay: number;
    topWords: WordCount[];
    topEmojis: EmojiCount[];
    peakHour: { hour: number; messages: number } | null;
    mostActiveSender: { name: string; messages: number } | null;
};

export type SenderStats = {
    name: string;
    messages: number;
    words: number;
    emojis: number;
    avgWordsPerMessage: number;
    messageShare: number;       // percentage of all messages, 0-100
    topWords: WordCount[];
    months: Array<{ month: MonthKey; messages: number; words: number }>;
};

export type HourStats = {
    hour: number;
    messages: number;
    words: number;
    topWords: WordCount[];
};

export type MonthStats = {
    month: MonthKey;
    label: string;              // e.g. "January 2024"
    messages: number;
    words: number;
    emojis: number;
    avgWordsPerMessage: number;
    topWords: WordCount[];
    senders: Array<{ name: string; messages: number }>;
};

export type ReportPolicies = {
    useStopwords: boolean;
    systemNotices: SystemNoticePolicy;
    continuationLines: ContinuationPolicy;
    topWordsLimit: number;
};

/**
 * Immutable result of one analysis run
 */
export type Report = DeepReadonly<{
    overall: OverallStats;
    senders: SenderStats[];
    hours: HourStats[];
    months: MonthStats[];
    lines: LineStats;
    options: ReportPolicies;
}>;

export type DeepReadonly<T> =
    T extends ReadonlyArray<infer E> ? ReadonlyArray<DeepReadonly<E>>
    : T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;
