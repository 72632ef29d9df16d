import type { ProcessedMessage, RawMessage, ResolvedTimezone } from '../types';
import { MESSAGE_KIND } from '../utils/constants';
import { parseEpochSeconds, toLocalDate } from '../utils/date.utils';

// ============================================================================
// MESSAGE PROCESSING
// ============================================================================

/**
 * Sums every reaction bucket on a message
 */
export function countReactions(message: RawMessage): number {
    return message.reactions.reduce((sum, reaction) => sum + reaction.count, 0);
}

/**
 * Turns one raw record into a ProcessedMessage, or null when it is a service
 * message, has no usable timestamp, belongs to another local year or has no
 * reactions.
 */
export function processMessage(
    message: RawMessage,
    targetYear: number,
    timezone: ResolvedTimezone
): ProcessedMessage | null {
    if (message.kind !== MESSAGE_KIND) {
        return null;
    }

    const epochSeconds = parseEpochSeconds(message.timestamp);
    if (epochSeconds === null) {
        return null;
    }

    // Year boundaries follow the local clock, not UTC
    const localDate = toLocalDate(epochSeconds, timezone);
    if (!localDate || localDate.getUTCFullYear() !== targetYear) {
        return null;
    }

    const totalReactions = countReactions(message);
    if (totalReactions === 0) {
        return null;
    }

    return {
        id: message.id,
        totalReactions,
        localDate,
        text: message.text
    };
}

/**
 * Filters an export down to the reacted messages of one local year, keeping
 * export order. Ineligible records are skipped without error.
 */
export function processMessages(
    messages: readonly RawMessage[],
    targetYear: number,
    timezone: ResolvedTimezone
): ProcessedMessage[] {
    const processed: ProcessedMessage[] = [];

    for (const message of messages) {
        const result = processMessage(message, targetYear, timezone);
        if (result) {
            processed.push(result);
        }
    }

    return processed;
}
