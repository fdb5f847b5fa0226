import type { ChartSeries, MonthKey, Report } from '../types';
import { formatShortMonthLabel } from '../utils/date.utils';

// ============================================================================
// TIME SERIES GENERATION
// ============================================================================

/**
 * Generates time series data for each participant (words per month).
 * Months a participant was silent in are filled with 0.
 */
export function generateTimeSeriesData(report: Report): Array<{ participant: string; data: Array<{ month: MonthKey; words: number }> }> {
    const sortedMonths = report.months.map(month => month.month);

    return report.senders.map(sender => {
        const wordsByMonth = new Map(sender.months.map(entry => [entry.month, entry.words]));
        const data = sortedMonths.map(month => ({
            month,
            words: wordsByMonth.get(month) ?? 0
        }));

        return { participant: sender.name, data };
    });
}

/**
 * Collects every series a chart renderer needs from a report
 */
export function generateChartSeries(report: Report): ChartSeries {
    const months = report.months.map(month => month.month);
    const messagesPerMonth = report.months.map(month => month.messages);

    let runningTotal = 0;
    const cumulativeMessages = messagesPerMonth.map(count => (runningTotal += count));

    const hourlyHistogram: number[] = Array(24).fill(0);
    for (const hour of report.hours) {
        hourlyHistogram[hour.hour] = hour.messages;
    }

    return {
        months,
        monthLabels: months.map(formatShortMonthLabel),
        messagesPerMonth,
        wordsPerMonth: report.months.map(month => month.words),
        avgWordsPerMessage: report.months.map(month => month.avgWordsPerMessage),
        cumulativeMessages,
        hourlyHistogram,
        messageShare: report.senders.map(sender => ({
            name: sender.name,
            messages: sender.messages,
            percentage: sender.messageShare
        })),
        senderWordsPerMonth: generateTimeSeriesData(report)
    };
}
