import { describe, it, expect } from 'vitest';
import { formatAverage, formatHour, formatHourlyHistogram, formatNumber, formatRankedWord } from './format.utils';

describe('format utils', () => {
    it('groups thousands', () => {
        expect(formatNumber(0)).toBe('0');
        expect(formatNumber(1234567)).toBe('1,234,567');
    });

    it('rounds averages to one decimal place', () => {
        expect(formatAverage(2 / 3)).toBe('0.7');
        expect(formatAverage(0)).toBe('0.0');
        expect(formatAverage(50)).toBe('50.0');
    });

    it('pads hours', () => {
        expect(formatHour(0)).toBe('00:00');
        expect(formatHour(9)).toBe('09:00');
        expect(formatHour(23)).toBe('23:00');
    });

    it('aligns ranked word rows', () => {
        expect(formatRankedWord(1, 'hello', 2)).toBe(' 1. hello' + ' '.repeat(11) + '(2 times)');
        expect(formatRankedWord(12, 'extraordinarily', 1500)).toBe('12. extraordinarily (1,500 times)');
    });

    it('labels histogram slots with their hour and share', () => {
        const histogram = Array<number>(24).fill(0);
        histogram[9] = 3;
        histogram[21] = 1;

        const formatted = formatHourlyHistogram(histogram);

        expect(formatted).toHaveLength(24);
        expect(formatted[9]).toEqual({ hour: '09:00', count: 3, percentage: 75 });
        expect(formatted[21]).toEqual({ hour: '21:00', count: 1, percentage: 25 });
        expect(formatted[0]).toEqual({ hour: '00:00', count: 0, percentage: 0 });
    });

    it('gives zero shares for an empty histogram', () => {
        expect(formatHourlyHistogram([0, 0]).map(entry => entry.percentage)).toEqual([0, 0]);
    });
});
