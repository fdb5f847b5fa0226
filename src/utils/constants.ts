/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";
import stopwordList from "../data/stopwords.json";

// ============================================================================
// ANALYSIS CONFIGURATION
// ============================================================================

// Default configuration values
export const DEFAULT_TOP_WORDS = 10;
export const DEFAULT_TOP_EMOJIS = 10;
export const MIN_WORD_LENGTH = 3;
export const AVERAGE_DAYS_PER_MONTH = 30.4;

// Two-digit years up to this value are read as 20xx, above it as 19xx
export const TWO_DIGIT_YEAR_PIVOT = 68;

export const DEFAULT_OUTPUT_DIR = "output";

// Leading underscore: transcript slugs never start with one
export const COMBINED_REPORT_NAME = "_combined";

// ============================================================================
// REGEX PATTERNS
// ============================================================================

/**
 * "M/D/YY, H:MM - Name: message"
 * Groups: date, time, sender, body
 */
export const MESSAGE_LINE_REGEX = /^(\d{1,2}\/\d{1,2}\/\d{2,4}),\s*(\d{1,2}:\d{2})\s*-\s*([^:]+):\s*(.+)/;

export const DATE_TOKEN_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d+)$/;
export const TIME_TOKEN_REGEX = /^(\d{1,2}):(\d{2})$/;

export const EMOJI_REGEX = emojiRegex();

// Control & direction marks often injected by WhatsApp (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

// Every ASCII punctuation character
export const ASCII_PUNCTUATION_REGEX = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

export const ASCII_WORD_REGEX = /^[a-z]+$/;

// ============================================================================
// SYSTEM NOTICES & STOPWORDS
// ============================================================================

/**
 * Platform-generated placeholders, matched as substrings of the raw line
 */
export const SYSTEM_NOTICE_PHRASES: readonly string[] = [
    "<Media omitted>",
    "You deleted this message",
    "This message was edited",
    "This message was deleted"
];

/**
 * Common English stopwords, only applied when stopword filtering is on
 */
export const STOPWORDS: ReadonlySet<string> = new Set<string>(stopwordList);

// ============================================================================
// CALENDAR
// ============================================================================

export const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];
