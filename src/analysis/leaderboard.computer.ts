import type { ChatExport, Leaderboard, LeaderboardEntry, LeaderboardOptions, ProcessedMessage } from '../types';
import { PREVIEW_LENGTH } from '../utils/constants';
import { formatLocalDate } from '../utils/date.utils';
import { buildMessageLink } from '../utils/link.utils';
import { truncatePreview } from '../utils/text.utils';
import { resolveTimezone } from './timezone.resolver';
import { processMessages } from './message.processor';
import { assertValidLimit, rankMessages } from './reaction.ranker';

// ============================================================================
// LEADERBOARD COMPUTATION
// ============================================================================

/**
 * Turns ranked messages into display rows, numbering from 1
 */
export function toLeaderboardEntries(channelId: number, ranked: readonly ProcessedMessage[]): LeaderboardEntry[] {
    return ranked.map((message, index) => ({
        rank: index + 1,
        messageId: message.id,
        localDate: formatLocalDate(message.localDate),
        link: buildMessageLink(channelId, message.id),
        totalReactions: message.totalReactions,
        preview: truncatePreview(message.text, PREVIEW_LENGTH)
    }));
}

/**
 * Computes the most-reacted messages of one local year.
 *
 * Configuration is validated before any record is looked at, so a bad timezone
 * or limit fails the run without partial results.
 */
export function computeLeaderboard(chat: ChatExport, options: LeaderboardOptions): Leaderboard {
    const timezone = resolveTimezone(options.timezone);
    assertValidLimit(options.limit);

    const processed = processMessages(chat.messages, options.year, timezone);
    const ranked = rankMessages(processed, options.limit);

    return {
        chatName: chat.name,
        channelId: chat.id,
        year: options.year,
        timezone: options.timezone,
        limit: options.limit,
        totalMessages: chat.messages.length,
        eligibleMessages: processed.length,
        entries: toLeaderboardEntries(chat.id, ranked)
    };
}
