import type {
    AnalysisOptions,
    CalendarDate,
    LineStats,
    MessageLineGroups,
    ParsedMessage,
    ParsedTranscript
} from '../types';
import { parseTranscriptDate, parseTranscriptHour } from '../utils/date.utils';
import { SYSTEM_NOTICE_PHRASES } from '../utils/constants';
import { classifyLine } from './line.classifier';
import { isSystemNotice } from './system-notice.filter';

// ============================================================================
// MESSAGE PARSER
// ============================================================================

/**
 * Builds a message from the groups of a "new message" line.
 * Returns null when the date or time is not a real calendar value.
 */
export function parseMessage(groups: MessageLineGroups, isSystemNoticeLine: boolean = false): ParsedMessage | null {
    const date = parseTranscriptDate(groups.date);
    if (!date) {
        return null;
    }

    const hour = parseTranscriptHour(groups.time);
    if (hour === null) {
        return null;
    }

    return freezeMessage(date, hour, groups.sender.trim(), groups.body.trim(), isSystemNoticeLine);
}

function freezeMessage(date: CalendarDate, hour: number, sender: string, body: string, isSystemNoticeLine: boolean): ParsedMessage {
    return Object.freeze({
        timestamp: Object.freeze({ date: Object.freeze({ ...date }), hour }),
        sender,
        body,
        isSystemNotice: isSystemNoticeLine
    });
}

export function createLineStats(): LineStats {
    return {
        totalLines: 0,
        blankLines: 0,
        messageLines: 0,
        continuationLines: 0,
        discardedLines: 0,
        systemNoticeLines: 0
    };
}

// ============================================================================
// TRANSCRIPT PARSER
// ============================================================================

/**
 * Parses transcript lines into messages.
 *
 * Multi-line bodies are stitched back together unless continuation lines are
 * set to "discard". Lines with a bad date or time are dropped, and so are the
 * continuation lines that follow them.
 */
export function parseTranscript(lines: Iterable<string>, options: AnalysisOptions = {}): ParsedTranscript {
    const noticePolicy = options.systemNotices ?? 'exclude';
    const continuationPolicy = options.continuationLines ?? 'join';
    const noticePhrases = options.systemNoticePhrases ?? SYSTEM_NOTICE_PHRASES;

    const stats = createLineStats();
    const messages: ParsedMessage[] = [];
    let current: ParsedMessage | null = null;
    let continuation: string[] = [];

    const flush = () => {
        if (!current) {
            return;
        }
        if (continuation.length > 0) {
            const { timestamp, sender, body, isSystemNotice: notice } = current;
            current = freezeMessage(timestamp.date, timestamp.hour, sender, [body, ...continuation].join("\n"), notice);
        }
        messages.push(current);
        current = null;
        continuation = [];
    };

    for (const rawLine of lines) {
        stats.totalLines += 1;

        const classified = classifyLine(rawLine);
        if (classified.kind === 'blank') {
            stats.blankLines += 1;
            continue;
        }

        const notice = isSystemNotice(classified.line, noticePhrases);
        if (notice) {
            stats.systemNoticeLines += 1;
        }

        if (classified.kind === 'message') {
            // whatever happens to this line, the previous message is complete
            flush();

            if (notice && noticePolicy === 'exclude') {
                stats.discardedLines += 1;
                continue;
            }

            const message = parseMessage(classified.groups, notice);
            if (!message) {
                stats.discardedLines += 1;
                continue;
            }

            stats.messageLines += 1;
            current = message;
            continue;
        }

        // Continuation: notices are never stitched into a body
        if (notice || continuationPolicy === 'discard' || !current) {
            stats.discardedLines += 1;
            continue;
        }

        continuation.push(classified.line);
        stats.continuationLines += 1;
    }

    flush();

    return { messages, lines: stats };
}
