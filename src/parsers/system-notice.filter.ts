import { SYSTEM_NOTICE_PHRASES } from '../utils/constants';

// ============================================================================
// SYSTEM NOTICE FILTER
// ============================================================================

/**
 * True when the raw line carries a platform-generated notice
 * ("<Media omitted>", edit and delete markers). Checked against the whole
 * line, before it is parsed.
 */
export function isSystemNotice(line: string, phrases: readonly string[] = SYSTEM_NOTICE_PHRASES): boolean {
    return phrases.some(phrase => line.includes(phrase));
}
