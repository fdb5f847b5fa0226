import { describe, it, expect } from 'vitest';
import { classifyLine } from './line.classifier';

describe('classifyLine', () => {
    it('treats empty and whitespace-only lines as blank', () => {
        expect(classifyLine('')).toEqual({ kind: 'blank' });
        expect(classifyLine('   \t ')).toEqual({ kind: 'blank' });
    });

    it('captures date, time, sender and body of a new message', () => {
        expect(classifyLine('1/5/24, 9:30 - Alice: hello there friend')).toEqual({
            kind: 'message',
            line: '1/5/24, 9:30 - Alice: hello there friend',
            groups: { date: '1/5/24', time: '9:30', sender: 'Alice', body: 'hello there friend' }
        });
    });

    it('tolerates missing and extra whitespace around separators', () => {
        const result = classifyLine('  1/5/24,9:30-Bob:hey  ');
        expect(result).toEqual({
            kind: 'message',
            line: '1/5/24,9:30-Bob:hey',
            groups: { date: '1/5/24', time: '9:30', sender: 'Bob', body: 'hey' }
        });
    });

    it('ends the sender at the first colon', () => {
        const result = classifyLine('1/5/24, 9:30 - Mary Ann : note: buy milk');
        expect(result.kind).toBe('message');
        if (result.kind === 'message') {
            expect(result.groups.sender).toBe('Mary Ann ');
            expect(result.groups.body).toBe('note: buy milk');
        }
    });

    it('ignores direction marks before the date', () => {
        const mark = String.fromCharCode(0x200e);
        expect(classifyLine(`${mark}1/5/24, 9:30 - Alice: hi`).kind).toBe('message');
    });

    it('classifies every other non-blank line as a continuation', () => {
        expect(classifyLine('and this wraps')).toEqual({ kind: 'continuation', line: 'and this wraps' });
        expect(classifyLine('1/5/24, 9:30 - Alice:')).toEqual({ kind: 'continuation', line: '1/5/24, 9:30 - Alice:' });
        expect(classifyLine('Messages and calls are end-to-end encrypted.').kind).toBe('continuation');
    });

    it('still matches lines whose date is out of range', () => {
        expect(classifyLine('13/45/24, 9:30 - Alice: hi').kind).toBe('message');
    });
});
