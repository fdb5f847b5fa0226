import { describe, it, expect } from 'vitest';
import { parseTranscript } from '../parsers/transcript.parser';
import { ChatAggregator } from './chat.aggregator';
import { resolveAnalysisOptions } from './options.resolver';

const messagesOf = (lines: string[]) => parseTranscript(lines).messages;

const SAMPLE = [
    '1/5/24, 9:30 - Alice: hello world hello',
    '1/6/24, 10:15 - Bob: hello there',
    '2/1/24, 9:00 - Alice: world peace now',
    '2/2/24, 21:45 - Cara: quiet night'
];

describe('ChatAggregator', () => {
    it('fills overall, month, sender and hour buckets', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf(SAMPLE));
        const report = aggregator.buildReport();

        expect(aggregator.totalMessages).toBe(4);
        expect(report.overall.totalWords).toBe(10);
        expect(report.overall.topWords.slice(0, 2)).toEqual([
            { word: 'hello', count: 3 },
            { word: 'world', count: 2 }
        ]);
        expect(report.months.map(month => [month.month, month.messages, month.words])).toEqual([
            ['2024-01', 2, 5],
            ['2024-02', 2, 5]
        ]);
        expect(report.senders.map(sender => [sender.name, sender.messages])).toEqual([
            ['Alice', 2],
            ['Bob', 1],
            ['Cara', 1]
        ]);
        expect(report.hours.map(hour => [hour.hour, hour.messages])).toEqual([
            [9, 2],
            [10, 1],
            [21, 1]
        ]);
        expect(report.senders[0]?.months).toEqual([
            { month: '2024-01', messages: 1, words: 3 },
            { month: '2024-02', messages: 1, words: 3 }
        ]);
    });

    it('keeps sender and month counts as partitions of the total', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf(SAMPLE));
        const report = aggregator.buildReport();
        const total = report.overall.totalMessages;

        const sum = (values: number[]) => values.reduce((acc, value) => acc + value, 0);

        expect(sum(report.senders.map(sender => sender.messages))).toBe(total);
        expect(sum(report.months.map(month => month.messages))).toBe(total);
        expect(sum(report.hours.map(hour => hour.messages))).toBe(total);
        for (const month of report.months) {
            expect(sum(month.senders.map(sender => sender.messages))).toBe(month.messages);
        }
    });

    it('produces the same report when partial aggregators are merged', () => {
        const whole = new ChatAggregator();
        whole.addAll(messagesOf(SAMPLE));

        const first = new ChatAggregator();
        first.addAll(messagesOf(SAMPLE.slice(0, 2)));
        const second = new ChatAggregator();
        second.addAll(messagesOf(SAMPLE.slice(2)));

        expect(first.merge(second).buildReport()).toEqual(whole.buildReport());
    });

    it('adds line statistics together', () => {
        const aggregator = new ChatAggregator();
        aggregator.recordLines(parseTranscript(['1/5/24, 9:30 - Alice: hi', 'wrapped']).lines);
        aggregator.recordLines(parseTranscript(['', 'orphan']).lines);

        expect(aggregator.snapshot().lines).toEqual({
            totalLines: 4,
            blankLines: 1,
            messageLines: 1,
            continuationLines: 1,
            discardedLines: 1,
            systemNoticeLines: 0
        });
    });

    it('counts included notices as messages without words', () => {
        const options = resolveAnalysisOptions({ systemNotices: 'include' });
        const aggregator = new ChatAggregator(options);
        aggregator.addAll(parseTranscript([
            '1/5/24, 9:30 - Alice: <Media omitted>',
            '1/5/24, 9:31 - Alice: nice photo'
        ], options).messages);
        const report = aggregator.buildReport();

        expect(report.overall.totalMessages).toBe(2);
        expect(report.overall.totalWords).toBe(2);
        expect(report.overall.topWords.map(entry => entry.word)).toEqual(['nice', 'photo']);
        expect(report.senders[0]?.avgWordsPerMessage).toBe(1);
    });

    it('breaks a peak-hour tie in favour of the earlier hour', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf([
            '1/5/24, 10:00 - Bob: later',
            '1/5/24, 9:00 - Alice: earlier'
        ]));

        expect(aggregator.buildReport().overall.peakHour).toEqual({ hour: 9, messages: 1 });
    });

    it('breaks a most-active tie in favour of whoever spoke first', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf([
            '1/5/24, 10:00 - Bob: first',
            '1/5/24, 10:01 - Alice: second'
        ]));
        const report = aggregator.buildReport();

        expect(report.overall.mostActiveSender).toEqual({ name: 'Bob', messages: 1 });
        expect(report.senders.map(sender => sender.name)).toEqual(['Bob', 'Alice']);
    });

    it('treats sender names case-sensitively', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf([
            '1/5/24, 10:00 - Jon: one',
            '1/5/24, 10:01 - jon: two'
        ]));

        expect(aggregator.buildReport().overall.totalSenders).toBe(2);
    });

    it('counts emojis per sender and overall', () => {
        const aggregator = new ChatAggregator();
        aggregator.addAll(messagesOf([
            '1/5/24, 9:30 - Alice: party \u{1F600}\u{1F600}',
            '1/5/24, 9:31 - Bob: yay \u{1F389}'
        ]));
        const report = aggregator.buildReport();

        expect(report.overall.totalEmojis).toBe(3);
        expect(report.overall.topEmojis).toEqual([
            { emoji: '\u{1F600}', count: 2 },
            { emoji: '\u{1F389}', count: 1 }
        ]);
        expect(report.senders.map(sender => sender.emojis)).toEqual([2, 1]);
        expect(report.overall.totalWords).toBe(2);
    });
});
