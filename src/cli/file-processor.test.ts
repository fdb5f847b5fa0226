import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { analyseTranscript } from '../analysis/transcript.analyser';
import {
    analyseTranscriptFile,
    analyseTranscriptFiles,
    readTranscriptLines,
    TranscriptSourceError,
    writeAnalysisOutputs
} from './file-processor';

let workDir: string;

beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'transcript-'));
});

afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
});

function writeTranscript(name: string, content: string | Buffer): string {
    const filePath = path.join(workDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
}

describe('readTranscriptLines', () => {
    it('drops a byte order mark and splits CRLF lines', () => {
        const filePath = writeTranscript('bom.txt', Buffer.concat([
            Buffer.from([0xef, 0xbb, 0xbf]),
            Buffer.from('1/5/24, 9:30 - Alice: hi\r\n1/5/24, 9:31 - Bob: yo\r\n', 'utf8')
        ]));

        expect(readTranscriptLines(filePath)).toEqual([
            '1/5/24, 9:30 - Alice: hi',
            '1/5/24, 9:31 - Bob: yo',
            ''
        ]);
    });

    it('decodes other encodings', () => {
        const filePath = writeTranscript('latin.txt', Buffer.from('1/5/24, 9:30 - José: olá amigo', 'latin1'));

        expect(readTranscriptLines(filePath, 'latin1')).toEqual(['1/5/24, 9:30 - José: olá amigo']);
    });

    it('reports a missing file', () => {
        const missing = path.join(workDir, 'missing.txt');

        expect(() => readTranscriptLines(missing)).toThrow(TranscriptSourceError);
        try {
            readTranscriptLines(missing);
        } catch (error) {
            expect(error).toBeInstanceOf(TranscriptSourceError);
            if (error instanceof TranscriptSourceError) {
                expect(error.filePath).toBe(missing);
                expect(error.name).toBe('TranscriptSourceError');
                expect(error.cause).toBeDefined();
            }
        }
    });

    it('rejects an unknown encoding', () => {
        const filePath = writeTranscript('chat.txt', '1/5/24, 9:30 - Alice: hi');

        expect(() => readTranscriptLines(filePath, 'not-an-encoding')).toThrow('Unknown encoding: not-an-encoding');
    });
});

describe('analyseTranscriptFile', () => {
    it('analyses a file and names its outputs after it', () => {
        const filePath = writeTranscript('Chat with Ana.txt', '1/5/24, 9:30 - Ana: hello there\n1/5/24, 9:31 - Ana: hello\n');

        const analysis = analyseTranscriptFile(filePath);

        expect(analysis.baseName).toBe('chat_with_ana');
        expect(analysis.report.overall.totalMessages).toBe(2);
        expect(analysis.report.overall.topWords[0]).toEqual({ word: 'hello', count: 2 });
        expect(analysis.report.lines.totalLines).toBe(3);
    });
});

describe('analyseTranscriptFiles', () => {
    it('combines several transcripts into one report', () => {
        const first = writeTranscript('a.txt', '1/5/24, 9:30 - Alice: hello\n1/6/24, 9:30 - Alice: again\n');
        const second = writeTranscript('b.txt', '2/5/24, 21:00 - Bob: hello\n');
        const seen: string[] = [];

        const { analyses, combined } = analyseTranscriptFiles(
            [first, second],
            {},
            undefined,
            analysis => seen.push(analysis.baseName)
        );

        expect(seen).toEqual(['a', 'b']);
        expect(analyses.map(analysis => analysis.report.overall.totalMessages)).toEqual([2, 1]);
        expect(combined.overall.totalMessages).toBe(3);
        expect(combined.overall.totalMonths).toBe(2);
        expect(combined.senders.map(sender => sender.name)).toEqual(['Alice', 'Bob']);
        expect(combined.overall.topWords[0]).toEqual({ word: 'hello', count: 2 });
        expect(combined.lines.totalLines).toBe(5);
    });

    it('names slug-alike files apart', () => {
        const first = writeTranscript('Chat A.txt', '1/5/24, 9:30 - Alice: hello\n');
        const second = writeTranscript('chat-a.txt', '1/5/24, 9:31 - Bob: hello\n');

        const { analyses } = analyseTranscriptFiles([first, second]);

        expect(analyses.map(analysis => analysis.baseName)).toEqual(['chat_a', 'chat_a_2']);
    });

    it('skips a file it cannot read and keeps the rest', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const first = writeTranscript('a.txt', '1/5/24, 9:30 - Alice: hello\n');
        const missing = path.join(workDir, 'gone.txt');
        const second = writeTranscript('b.txt', '2/5/24, 21:00 - Bob: hello\n');

        try {
            const { analyses, failures, combined } = analyseTranscriptFiles([first, missing, second]);

            expect(analyses.map(analysis => analysis.baseName)).toEqual(['a', 'b']);
            expect(failures).toHaveLength(1);
            expect(failures[0]?.filePath).toBe(missing);
            expect(failures[0]?.error).toBeInstanceOf(TranscriptSourceError);
            expect(combined.overall.totalMessages).toBe(2);
            expect(log).toHaveBeenCalledTimes(1);
            expect(String(log.mock.calls[0]?.[0])).toContain(`Skipping ${missing}`);
        } finally {
            log.mockRestore();
        }
    });
});

describe('writeAnalysisOutputs', () => {
    it('writes the text report and the JSON analysis', () => {
        const report = analyseTranscript([
            '1/5/24, 9:30 - Alice: hello there friend',
            '1/6/24, 10:15 - Bob: hello again'
        ]);
        const outputDir = path.join(workDir, 'nested', 'output');

        const paths = writeAnalysisOutputs(report, outputDir, 'chat');

        expect(paths.resultsPath).toBe(path.join(outputDir, 'chat_analysis_results.txt'));
        expect(paths.jsonPath).toBe(path.join(outputDir, 'chat_analysis.json'));

        const text = fs.readFileSync(paths.resultsPath, 'utf8');
        expect(text.startsWith(`${'='.repeat(80)}\nCHAT TRANSCRIPT WORD FREQUENCY ANALYSIS\n`)).toBe(true);
        expect(text.endsWith('\n')).toBe(true);
        expect(text).not.toContain('\u{1F31F}');

        const json = JSON.parse(fs.readFileSync(paths.jsonPath, 'utf8'));
        expect(json.overall.totalMessages).toBe(2);
        expect(json.senders).toHaveLength(2);
        expect(json.series.messagesPerMonth).toEqual([2]);
        expect(json.options.continuationLines).toBe('join');
    });
});
