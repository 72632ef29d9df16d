import type { Leaderboard } from '../types';
import { colorize, createTable, formatNumber, logHeader, logWarning } from './cli.utils';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export function formatLeaderboardTitle(leaderboard: Leaderboard): string {
    return `Top ${leaderboard.limit} messages for ${leaderboard.year} (TZ: ${leaderboard.timezone})`;
}

/**
 * Plain one-line-per-entry rendering:
 *   "1. 2023-05-04 18:20 - https://t.me/c/123/45 (Reactions: 17)"
 */
export function formatLeaderboardLines(leaderboard: Leaderboard): string[] {
    return leaderboard.entries.map(entry =>
        `${entry.rank}. ${entry.localDate} - ${entry.link} (Reactions: ${entry.totalReactions})`
    );
}

/**
 * Shape written by --json
 */
export function toJSONOutput(leaderboard: Leaderboard) {
    return {
        chat: {
            name: leaderboard.chatName ?? null,
            id: leaderboard.channelId
        },
        year: leaderboard.year,
        timezone: leaderboard.timezone,
        limit: leaderboard.limit,
        totalMessages: leaderboard.totalMessages,
        eligibleMessages: leaderboard.eligibleMessages,
        top: leaderboard.entries
    };
}

export function printPlainLeaderboard(leaderboard: Leaderboard): void {
    console.log(`--- ${formatLeaderboardTitle(leaderboard)} ---`);
    for (const line of formatLeaderboardLines(leaderboard)) {
        console.log(line);
    }
}

export function printLeaderboard(leaderboard: Leaderboard): void {
    logHeader(formatLeaderboardTitle(leaderboard));

    if (leaderboard.entries.length === 0) {
        logWarning(`No messages with reactions found for ${leaderboard.year}`);
        return;
    }

    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'Date', width: 16, align: 'left' },
            { header: 'Reactions', width: 9, align: 'right' },
            { header: 'Link', width: 40, align: 'left' },
            { header: 'Preview', width: 40, align: 'left', truncate: true }
        ],
        leaderboard.entries.map(entry => [
            entry.rank.toString(),
            entry.localDate,
            formatNumber(entry.totalReactions),
            entry.link,
            entry.preview
        ])
    );

    console.log();
    console.log(colorize(`${formatNumber(leaderboard.eligibleMessages)} of ${formatNumber(leaderboard.totalMessages)} messages had reactions in ${leaderboard.year}`, 'dim'));
}
