/**
 * Text Report Renderer
 *
 * Prints a report as plain lines, in a fixed section order: overall stats,
 * senders by message count, hourly activity, monthly breakdown.
 */

import type { Report, WordCount } from '../types';
import { formatAverage, formatHour, formatNumber, formatRankedWord } from './format.utils';

// ============================================================================
// TYPES
// ============================================================================

/**
 * console: section headings carry icons; file: plain text
 */
export type TextReportStyle = 'console' | 'file';

export type TextReportOptions = {
    style?: TextReportStyle;
};

const WIDE_RULE = '='.repeat(80);
const SECTION_RULE = '='.repeat(50);
const SENDER_RULE = '-'.repeat(50);
const MONTH_RULE = '-'.repeat(40);

const ICONS = {
    overall: '🌟',
    averages: '📊',
    topWords: '🏆',
    sender: '👤',
    hourly: '🕐',
    month: '📅'
};

// ============================================================================
// RENDERING
// ============================================================================

export function renderTextReport(report: Report, options: TextReportOptions = {}): string[] {
    const style = options.style ?? 'console';
    const icon = (name: keyof typeof ICONS) => (style === 'console' ? `${ICONS[name]} ` : '');
    const { overall } = report;
    const limit = report.options.topWordsLimit;
    const lines: string[] = [];

    const rankedWords = (words: readonly WordCount[]) => {
        words.forEach((entry, index) => lines.push(formatRankedWord(index + 1, entry.word, entry.count)));
    };

    lines.push(WIDE_RULE);
    lines.push('CHAT TRANSCRIPT WORD FREQUENCY ANALYSIS');
    lines.push(WIDE_RULE);

    // Overall
    lines.push('');
    lines.push(`${icon('overall')}OVERALL STATISTICS`);
    lines.push(SECTION_RULE);
    lines.push(`Total messages: ${formatNumber(overall.totalMessages)}`);
    lines.push(`Total words analyzed: ${formatNumber(overall.totalWords)}`);
    lines.push(`Total emojis: ${formatNumber(overall.totalEmojis)}`);
    lines.push(`Total months analyzed: ${overall.totalMonths}`);
    lines.push(`Approximate total days: ${Math.floor(overall.totalDays)}`);
    lines.push(`Number of people in chat: ${overall.totalSenders}`);
    lines.push('');
    lines.push(`${icon('averages')}AVERAGES:`);
    lines.push(`Average messages per month: ${formatAverage(overall.avgMessagesPerMonth)}`);
    lines.push(`Average words per month: ${formatAverage(overall.avgWordsPerMonth)}`);
    lines.push(`Average messages per day: ${formatAverage(overall.avgMessagesPerDay)}`);
    lines.push(`Average words per day: ${formatAverage(overall.avgWordsPerDay)}`);
    lines.push('');
    lines.push(`${icon('topWords')}TOP ${limit} MOST USED WORDS (OVERALL):`);
    rankedWords(overall.topWords);

    // Senders
    lines.push('');
    lines.push(WIDE_RULE);
    lines.push('PER-PERSON STATISTICS');
    lines.push(WIDE_RULE);

    for (const sender of report.senders) {
        lines.push('');
        lines.push(`${icon('sender')}${sender.name}`);
        lines.push(SENDER_RULE);
        lines.push(`Total messages: ${formatNumber(sender.messages)}`);
        lines.push(`Total words: ${formatNumber(sender.words)}`);
        lines.push(`Average words per message: ${formatAverage(sender.avgWordsPerMessage)}`);
        lines.push(`Message share: ${formatAverage(sender.messageShare)}%`);
        lines.push('');
        lines.push(`Top ${limit} most used words:`);
        rankedWords(sender.topWords);
    }

    // Hours
    if (overall.peakHour) {
        lines.push('');
        lines.push(`${icon('hourly')}HOURLY ACTIVITY:`);
        lines.push(SECTION_RULE);
        lines.push(`Most active hour: ${formatHour(overall.peakHour.hour)} (${formatNumber(overall.peakHour.messages)} messages)`);
        lines.push('');
        lines.push('Messages by hour:');
        for (const hour of report.hours) {
            lines.push(`${formatHour(hour.hour)} - ${formatNumber(hour.messages)} messages`);
        }
    }

    // Months
    lines.push('');
    lines.push(WIDE_RULE);
    lines.push('MONTHLY BREAKDOWN');
    lines.push(WIDE_RULE);

    for (const month of report.months) {
        lines.push('');
        lines.push(`${icon('month')}${month.label}`);
        lines.push(MONTH_RULE);
        lines.push(`Total messages: ${formatNumber(month.messages)}`);
        lines.push(`Total words analyzed: ${formatNumber(month.words)}`);
        lines.push('');
        lines.push(`Top ${limit} most used words:`);
        rankedWords(month.topWords);
    }

    return lines;
}

/**
 * Short summary used by the CLI once the full report has been printed
 */
export function renderSummaryLines(report: Report): string[] {
    const { overall } = report;
    const top = overall.topWords[0];

    return [
        `Total Messages: ${formatNumber(overall.totalMessages)}`,
        `Total Words: ${formatNumber(overall.totalWords)}`,
        `Months Analyzed: ${overall.totalMonths}`,
        `People in Chat: ${overall.totalSenders}`,
        `Top Word: ${top ? `"${top.word}" (${formatNumber(top.count)} times)` : 'N/A'}`,
        `Peak Hour: ${overall.peakHour ? `${formatHour(overall.peakHour.hour)} (${formatNumber(overall.peakHour.messages)} messages)` : 'N/A'}`,
        `Most Active: ${overall.mostActiveSender ? `${overall.mostActiveSender.name} (${formatNumber(overall.mostActiveSender.messages)} messages)` : 'N/A'}`
    ];
}
