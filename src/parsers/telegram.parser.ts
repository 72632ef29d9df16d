import type { ChatExport, RawMessage, Reaction } from '../types';
import { ExportFormatError } from '../utils/errors';
import { flattenMessageText } from '../utils/text.utils';

// ============================================================================
// TELEGRAM PARSER
// ============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Reads the reactions array of a message. Missing reactions mean none; a
 * malformed entry makes the whole list unusable.
 */
function parseReactions(value: unknown): Reaction[] | null {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        return null;
    }

    const entries: unknown[] = value;
    const reactions: Reaction[] = [];
    for (const entry of entries) {
        if (!isObject(entry) || !isNonNegativeInteger(entry.count)) {
            return null;
        }
        reactions.push({
            count: entry.count,
            emoji: typeof entry.emoji === 'string' ? entry.emoji : undefined
        });
    }
    return reactions;
}

/**
 * Maps one exported message object. Returns null for records too broken to
 * identify; these are skipped like any other ineligible record.
 */
export function parseTelegramMessage(value: unknown): RawMessage | null {
    if (!isObject(value) || typeof value.id !== 'number' || !Number.isSafeInteger(value.id)) {
        return null;
    }

    const reactions = parseReactions(value.reactions);
    if (!reactions) {
        return null;
    }

    return {
        id: value.id,
        timestamp: typeof value.date_unixtime === 'string' ? value.date_unixtime : undefined,
        reactions,
        kind: typeof value.type === 'string' ? value.type : '',
        text: flattenMessageText(value.text)
    };
}

/**
 * Parses a Telegram Desktop JSON export (result.json).
 * Throws ExportFormatError when the document itself is unusable.
 */
export function parseTelegramExport(chatJson: string): ChatExport {
    let data: unknown;
    try {
        data = JSON.parse(chatJson);
    } catch (error) {
        throw new ExportFormatError(`Export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    if (!isObject(data)) {
        throw new ExportFormatError("Export must be a JSON object");
    }
    if (typeof data.id !== 'number' || !Number.isSafeInteger(data.id)) {
        throw new ExportFormatError("Export is missing an integer \"id\" field");
    }
    if (!Array.isArray(data.messages)) {
        throw new ExportFormatError("Export is missing a \"messages\" array");
    }

    const messages: RawMessage[] = [];
    for (const entry of data.messages) {
        const message = parseTelegramMessage(entry);
        if (message) {
            messages.push(message);
        }
    }

    return {
        name: typeof data.name === 'string' ? data.name : undefined,
        id: data.id,
        messages
    };
}
