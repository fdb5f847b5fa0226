import { describe, it, expect } from 'vitest';
import { WordFrequencyTable } from './word-frequency';

describe('WordFrequencyTable', () => {
    it('counts tokens and totals', () => {
        const table = new WordFrequencyTable();
        table.addAll(['hello', 'there', 'hello']);
        table.add('friend', 3);

        expect(table.count('hello')).toBe(2);
        expect(table.count('missing')).toBe(0);
        expect(table.size).toBe(3);
        expect(table.total).toBe(6);
    });

    it('ranks by count and keeps first-seen order on ties', () => {
        const table = new WordFrequencyTable();
        table.addAll(['b', 'a', 'c', 'd', 'd']);

        expect(table.top(4)).toEqual([
            { key: 'd', count: 2 },
            { key: 'b', count: 1 },
            { key: 'a', count: 1 },
            { key: 'c', count: 1 }
        ]);
        expect(table.top(2).map(entry => entry.key)).toEqual(['d', 'b']);
    });

    it('returns nothing for a zero or negative limit', () => {
        const table = new WordFrequencyTable();
        table.add('word');

        expect(table.top(0)).toEqual([]);
        expect(table.top(-3)).toEqual([]);
    });

    it('merges counts and appends unseen keys after existing ones', () => {
        const left = new WordFrequencyTable();
        left.addAll(['x', 'y']);
        const right = new WordFrequencyTable();
        right.addAll(['z', 'y', 'y']);

        left.merge(right);

        expect(left.entries()).toEqual([
            { key: 'x', count: 1 },
            { key: 'y', count: 3 },
            { key: 'z', count: 1 }
        ]);
        expect(right.entries()).toEqual([
            { key: 'z', count: 1 },
            { key: 'y', count: 2 }
        ]);
    });
});
