import type { ProcessedMessage } from '../types';
import { InvalidLimitError } from '../utils/errors';

// ============================================================================
// RANKING
// ============================================================================

export function assertValidLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 0) {
        throw new InvalidLimitError(limit);
    }
}

/**
 * Orders messages by total reactions, most first, and keeps the top `limit`.
 * Array.prototype.sort is stable, so ties keep their export order.
 */
export function rankMessages(messages: readonly ProcessedMessage[], limit: number): ProcessedMessage[] {
    assertValidLimit(limit);

    return [...messages]
        .sort((a, b) => b.totalReactions - a.totalReactions)
        .slice(0, limit);
}
