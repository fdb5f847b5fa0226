/**
 * Word Frequency Table
 */

// ============================================================================
// FREQUENCY TABLE
// ============================================================================

export type FrequencyEntry = { key: string; count: number };

/**
 * Token -> occurrence count. Keys keep the order they were first seen in,
 * which is the tie-break for equal counts when ranking.
 */
export class WordFrequencyTable {
    private counts = new Map<string, number>();

    add(token: string, times: number = 1): void {
        this.counts.set(token, (this.counts.get(token) ?? 0) + times);
    }

    addAll(tokens: Iterable<string>): void {
        for (const token of tokens) {
            this.add(token);
        }
    }

    count(token: string): number {
        return this.counts.get(token) ?? 0;
    }

    get size(): number {
        return this.counts.size;
    }

    /** Sum of every count in the table. */
    get total(): number {
        let sum = 0;
        for (const value of this.counts.values()) {
            sum += value;
        }
        return sum;
    }

    /**
     * Adds another table's counts. Tokens new to this table are appended
     * after the existing ones, in the other table's first-seen order.
     */
    merge(other: WordFrequencyTable): void {
        for (const [token, value] of other.counts) {
            this.add(token, value);
        }
    }

    /**
     * Highest counts first; equal counts keep first-seen order
     * (Array.prototype.sort is stable).
     */
    top(limit: number): FrequencyEntry[] {
        return Array.from(this.counts, ([key, count]) => ({ key, count }))
            .sort((a, b) => b.count - a.count)
            .slice(0, Math.max(0, limit));
    }

    entries(): FrequencyEntry[] {
        return Array.from(this.counts, ([key, count]) => ({ key, count }));
    }
}
