import type { AnalysisOptions, ResolvedAnalysisOptions } from '../types';
import { DEFAULT_TOP_WORDS, STOPWORDS, SYSTEM_NOTICE_PHRASES } from '../utils/constants';

// ============================================================================
// OPTION DEFAULTS
// ============================================================================

/**
 * Fills every unset analysis option with its default.
 * A top-words limit that is not a non-negative number falls back to 10.
 */
export function resolveAnalysisOptions(options: AnalysisOptions = {}): ResolvedAnalysisOptions {
    const limit = options.topWordsLimit;

    return {
        useStopwords: options.useStopwords ?? false,
        stopwords: options.stopwords ? new Set(options.stopwords) : STOPWORDS,
        systemNotices: options.systemNotices ?? 'exclude',
        systemNoticePhrases: options.systemNoticePhrases ?? SYSTEM_NOTICE_PHRASES,
        continuationLines: options.continuationLines ?? 'join',
        topWordsLimit: typeof limit === 'number' && Number.isFinite(limit) && limit >= 0
            ? Math.floor(limit)
            : DEFAULT_TOP_WORDS
    };
}
