/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import type { TokeniseOptions } from '../types';
import {
    ASCII_PUNCTUATION_REGEX,
    ASCII_WORD_REGEX,
    CONTROL_MARKS_REGEX,
    EMOJI_REGEX,
    MIN_WORD_LENGTH,
    STOPWORDS
} from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Removes control and direction marks from text that WhatsApp often injects
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

export function removeAsciiPunctuation(text: string): string {
    return text.replace(ASCII_PUNCTUATION_REGEX, "");
}

/**
 * Splits a message body into countable word tokens.
 *
 * Lower-cases, trims, strips ASCII punctuation, splits on whitespace and keeps
 * tokens of at least three ASCII letters. Stopwords are dropped only when
 * `useStopwords` is set. Order and duplicates are preserved.
 */
export function tokeniseWords(text: string, options: TokeniseOptions = {}): string[] {
    const cleaned = removeAsciiPunctuation(text.toLowerCase().trim());
    const stopwords = options.useStopwords ? (options.stopwords ?? STOPWORDS) : null;

    return cleaned
        .split(/\s+/)
        .filter(word => word.length >= MIN_WORD_LENGTH && ASCII_WORD_REGEX.test(word))
        .filter(word => !stopwords || !stopwords.has(word));
}

// ============================================================================
// EMOJIS
// ============================================================================

/**
 * Returns every grapheme cluster of the text that is an emoji, in order
 */
export function extractEmojis(text: string): string[] {
    const clusters = GRAPHEME_SPLITTER.splitGraphemes(text);
    const emojis: string[] = [];

    for (const cluster of clusters) {
        // the shared regex is global, so reset it between clusters
        EMOJI_REGEX.lastIndex = 0;
        if (EMOJI_REGEX.test(cluster)) {
            emojis.push(cluster);
        }
    }

    return emojis;
}

/**
 * Counts the number of emojis in text using proper grapheme splitting
 */
export function countEmojis(text: string): number {
    return extractEmojis(text).length;
}
