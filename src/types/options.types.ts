/**
 * Analysis Configuration Types
 */

/**
 * What happens to lines carrying a platform notice such as "<Media omitted>".
 *  - exclude: the line never enters any bucket
 *  - include: counted as a message, never tokenised
 */
export type SystemNoticePolicy = 'exclude' | 'include';

/**
 * What happens to non-blank lines that do not start a new message.
 *  - join: appended to the previous message body with a newline
 *  - discard: dropped
 */
export type ContinuationPolicy = 'join' | 'discard';

export type AnalysisOptions = {
    useStopwords?: boolean;
    stopwords?: Iterable<string>;
    systemNotices?: SystemNoticePolicy;
    systemNoticePhrases?: readonly string[];
    continuationLines?: ContinuationPolicy;
    topWordsLimit?: number;
};

export type ResolvedAnalysisOptions = {
    useStopwords: boolean;
    stopwords: ReadonlySet<string>;
    systemNotices: SystemNoticePolicy;
    systemNoticePhrases: readonly string[];
    continuationLines: ContinuationPolicy;
    topWordsLimit: number;
};

export type TokeniseOptions = {
    useStopwords?: boolean;
    stopwords?: ReadonlySet<string>;
};
