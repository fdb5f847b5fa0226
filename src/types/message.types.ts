/**
 * Message and Line Type Definitions
 */

/**
 * A single line of transcript input, possibly empty or whitespace-only
 */
export type RawLine = string;

/**
 * Calendar date with day-level granularity (month is 1-based)
 */
export type CalendarDate = {
    year: number;
    month: number;
    day: number;
};

/**
 * When a message was sent. Minutes are dropped once the hour is extracted.
 */
export type MessageTimestamp = {
    date: CalendarDate;
    hour: number;
};

/**
 * A normalised transcript message. Frozen once the parser hands it out.
 */
export type ParsedMessage = Readonly<{
    timestamp: Readonly<{ date: Readonly<CalendarDate>; hour: number }>;
    sender: string;
    body: string;
    isSystemNotice: boolean;
}>;

/**
 * Text captured from a "new message" line, before any validation
 */
export type MessageLineGroups = {
    date: string;
    time: string;
    sender: string;
    body: string;
};

/**
 * Outcome of classifying one raw line
 */
export type LineClassification =
    | { kind: 'blank' }
    | { kind: 'message'; line: string; groups: MessageLineGroups }
    | { kind: 'continuation'; line: string };

/**
 * Counters collected while walking the transcript
 */
export type LineStats = {
    totalLines: number;
    blankLines: number;
    messageLines: number;       // accepted new-message lines (after notice policy)
    continuationLines: number;  // lines joined onto a previous message body
    discardedLines: number;     // unparsable, orphaned or policy-dropped lines
    systemNoticeLines: number;  // lines carrying a platform notice, whatever the policy
};

/**
 * Result of parsing a whole transcript
 */
export type ParsedTranscript = {
    messages: ParsedMessage[];
    lines: LineStats;
};
