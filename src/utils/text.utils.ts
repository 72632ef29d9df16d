/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import { CONTROL_MARKS_REGEX } from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Removes control and direction marks from text
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Flattens an exported `text` field into plain text.
 *
 * Telegram writes plain messages as a string and formatted ones as an array
 * mixing strings with entity objects such as `{ type: "bold", text: "hi" }`.
 */
export function flattenMessageText(value: unknown): string {
    if (typeof value === 'string') {
        return stripControlMarks(value);
    }
    if (!Array.isArray(value)) {
        return '';
    }

    const parts: unknown[] = value;
    let text = '';
    for (const part of parts) {
        if (typeof part === 'string') {
            text += part;
        } else if (part !== null && typeof part === 'object' && 'text' in part && typeof part.text === 'string') {
            text += part.text;
        }
    }
    return stripControlMarks(text);
}

/**
 * Number of user-perceived characters in the text
 */
export function graphemeLength(text: string): number {
    return GRAPHEME_SPLITTER.countGraphemes(text);
}

/**
 * Collapses whitespace runs (newlines included) and cuts the text to at most
 * `maxGraphemes` visible characters, appending an ellipsis when cut.
 */
export function truncatePreview(text: string, maxGraphemes: number): string {
    const singleLine = text
        .replace(/[\u00A0\u202F\u2007]/g, ' ') // NBSP, NNBSP, figure space
        .replace(/\s+/g, ' ')
        .trim();

    const clusters = GRAPHEME_SPLITTER.splitGraphemes(singleLine);
    if (clusters.length <= maxGraphemes) {
        return singleLine;
    }
    if (maxGraphemes <= 0) {
        return '';
    }
    return clusters.slice(0, maxGraphemes - 1).join('').trimEnd() + '…';
}
