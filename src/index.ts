#!/usr/bin/env node
/**
 * Reaction Leaderboard - Main Entry Point
 *
 * Ranks the messages of a Telegram chat export by how many reactions they got
 * in a given year.
 *
 * Usage:
 *  reaction-leaderboard --file result.json --year 2023 --timezone +0300 --limit 10
 */

import { runCLI } from './cli/main';

export { computeLeaderboard, toLeaderboardEntries } from './analysis/leaderboard.computer';
export { processMessage, processMessages, countReactions } from './analysis/message.processor';
export { rankMessages } from './analysis/reaction.ranker';
export { resolveTimezone } from './analysis/timezone.resolver';
export { parseTelegramExport } from './parsers/telegram.parser';
export { buildMessageLink, cleanChannelId } from './utils/link.utils';
export * from './utils/errors';
export type * from './types';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

if (require.main === module) {
    runCLI(process.argv).then((exitCode) => {
        process.exitCode = exitCode;
    }).catch((error: unknown) => {
        console.error("❌ Unexpected error:", error);
        process.exit(1);
    });
}
