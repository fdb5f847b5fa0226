import type { LineClassification } from '../types';
import { MESSAGE_LINE_REGEX } from '../utils/constants';
import { stripControlMarks } from '../utils/text.utils';

// ============================================================================
// LINE CLASSIFIER
// ============================================================================

/**
 * Decides whether a raw line starts a new message, continues the previous
 * one, or carries nothing.
 *
 * The pattern must expose four groups: date, time, sender and body.
 */
export function classifyLine(rawLine: string, pattern: RegExp = MESSAGE_LINE_REGEX): LineClassification {
    const line = stripControlMarks(rawLine).trim();
    if (!line) {
        return { kind: 'blank' };
    }

    const match = pattern.exec(line);
    if (match) {
        const [, date, time, sender, body] = match;
        if (date !== undefined && time !== undefined && sender !== undefined && body !== undefined) {
            return { kind: 'message', line, groups: { date, time, sender, body } };
        }
    }

    return { kind: 'continuation', line };
}
