/**
 * Date Parsing Utilities
 */

import type { CalendarDate, MonthKey } from '../types';
import { DATE_TOKEN_REGEX, MONTH_NAMES, TIME_TOKEN_REGEX, TWO_DIGIT_YEAR_PIVOT } from './constants';

// ============================================================================
// TRANSCRIPT DATE PARSING
// ============================================================================

/**
 * Export format examples:
 *   "1/5/24, 9:30 - Name: message"     (two-digit year)
 *   "12/31/2023, 23:59 - Name: message" (four-digit year)
 *
 * Dates are month-first. A date is accepted as M/D/YY first, then M/D/YYYY.
 */
export function parseTranscriptDate(text: string): CalendarDate | null {
    const match = DATE_TOKEN_REGEX.exec(text.trim());
    if (!match) {
        return null;
    }

    const [, monthText, dayText, yearText] = match;
    const month = parseInt(monthText, 10);
    const day = parseInt(dayText, 10);

    let year: number;
    if (yearText.length === 2) {
        const shortYear = parseInt(yearText, 10);
        year = shortYear <= TWO_DIGIT_YEAR_PIVOT ? 2000 + shortYear : 1900 + shortYear;
    } else if (yearText.length === 4) {
        year = parseInt(yearText, 10);
    } else {
        return null;
    }

    if (month < 1 || month > 12) return null;
    if (day < 1 || day > daysInMonth(year, month)) return null;

    return { year, month, day };
}

/**
 * Parses "H:MM" (24-hour clock) and returns only the hour
 */
export function parseTranscriptHour(text: string): number | null {
    const match = TIME_TOKEN_REGEX.exec(text.trim());
    if (!match) {
        return null;
    }

    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);

    if (hour > 23 || minute > 59) {
        return null;
    }
    return hour;
}

export function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
    const lengths = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
    return lengths[month - 1] ?? 0;
}

// ============================================================================
// MONTH KEYS
// ============================================================================

export function toMonthKey(date: CalendarDate): MonthKey {
    return `${String(date.year).padStart(4, '0')}-${String(date.month).padStart(2, '0')}`;
}

/**
 * "2024-01" -> "January 2024"
 */
export function formatMonthLabel(monthKey: MonthKey): string {
    const [yearText, monthText] = monthKey.split('-');
    const name = MONTH_NAMES[parseInt(monthText, 10) - 1];
    return name ? `${name} ${yearText}` : monthKey;
}

/**
 * "2024-01" -> "Jan 2024"
 */
export function formatShortMonthLabel(monthKey: MonthKey): string {
    const [yearText, monthText] = monthKey.split('-');
    const name = MONTH_NAMES[parseInt(monthText, 10) - 1];
    return name ? `${name.slice(0, 3)} ${yearText}` : monthKey;
}
