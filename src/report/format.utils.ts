// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

const NUMBER_FORMAT = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Formats a whole number with commas for better readability
 */
export function formatNumber(num: number): string {
    return NUMBER_FORMAT.format(num);
}

/**
 * One decimal place, e.g. averages and percentages
 */
export function formatAverage(value: number): string {
    return value.toFixed(1);
}

/**
 * 9 -> "09:00"
 */
export function formatHour(hour: number): string {
    return `${hour.toString().padStart(2, '0')}:00`;
}

/**
 * " 1. hello           (2 times)"
 */
export function formatRankedWord(rank: number, word: string, count: number): string {
    return `${rank.toString().padStart(2)}. ${word.padEnd(15)} (${formatNumber(count)} times)`;
}

/**
 * Formats hourly histogram with actual hour labels
 */
export function formatHourlyHistogram(histogram: readonly number[]): Array<{ hour: string; count: number; percentage: number }> {
    const total = histogram.reduce((sum, count) => sum + count, 0);
    return histogram.map((count, index) => ({
        hour: formatHour(index),
        count,
        percentage: total > 0 ? (count / total * 100) : 0
    }));
}
