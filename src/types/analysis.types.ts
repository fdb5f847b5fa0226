/**
 * Derived Series Type Definitions
 */

import type { MonthKey } from './report.types';

/**
 * Read-only series a chart renderer draws from a report
 */
export type ChartSeries = {
    months: MonthKey[];
    monthLabels: string[];
    messagesPerMonth: number[];
    wordsPerMonth: number[];
    avgWordsPerMessage: number[];   // per month, 0 for months without messages
    cumulativeMessages: number[];
    hourlyHistogram: number[];      // 24 bins
    messageShare: Array<{ name: string; messages: number; percentage: number }>;
    senderWordsPerMonth: Array<{ participant: string; data: Array<{ month: MonthKey; words: number }> }>;
};
