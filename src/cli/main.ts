import path from "node:path";
import { Command, InvalidArgumentError } from 'commander';
import { computeLeaderboard } from '../analysis/leaderboard.computer';
import { assertValidLimit } from '../analysis/reaction.ranker';
import { resolveTimezone } from '../analysis/timezone.resolver';
import { DEFAULT_ENCODING, DEFAULT_LIMIT, DEFAULT_TIMEZONE } from '../utils/constants';
import { formatOffset } from '../utils/date.utils';
import { LeaderboardError } from '../utils/errors';
import { loadChatExport } from './file-processor';
import { printLeaderboard, printPlainLeaderboard, toJSONOutput } from './output';
import { formatNumber, logInfo, logSuccess, showError } from './cli.utils';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export type CLIOptions = {
    file: string;
    year: number;
    timezone: string;
    limit: number;
    encoding: string;
    json?: boolean;
    plain?: boolean;
};

export function parseYear(value: string): number {
    if (!/^-?\d+$/.test(value)) {
        throw new InvalidArgumentError('Year must be an integer, e.g. 2023.');
    }
    return Number(value);
}

export function parseLimit(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Limit must be a non-negative integer.');
    }
    // Anything past 2^53 already means "show everything"
    const limit = Number(value);
    return Number.isSafeInteger(limit) ? limit : Number.MAX_SAFE_INTEGER;
}

export function createProgram(): Command {
    return new Command()
        .name('reaction-leaderboard')
        .description('Lists the most-reacted messages of a year from a Telegram chat export')
        .requiredOption('-f, --file <path>', 'path to the exported result.json')
        .requiredOption('-y, --year <year>', 'year to summarise, e.g. 2023', parseYear)
        .option('-t, --timezone <offset>', 'UTC offset deciding which year a message belongs to (+0300, -05:00)', DEFAULT_TIMEZONE)
        .option('-l, --limit <count>', 'number of messages to show', parseLimit, DEFAULT_LIMIT)
        .option('-e, --encoding <name>', 'text encoding of the export file', DEFAULT_ENCODING)
        .option('--json', 'print the leaderboard as JSON')
        .option('--plain', 'print one uncoloured line per message');
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function. Resolves to the process exit code.
 */
export async function runCLI(argv: string[], program: Command = createProgram()): Promise<number> {
    await program.parseAsync(argv);
    const options = program.opts<CLIOptions>();
    const verbose = !options.json && !options.plain;

    try {
        // Fail on bad configuration before touching the file
        const offset = resolveTimezone(options.timezone);
        assertValidLimit(options.limit);
        const filePath = path.resolve(options.file);

        if (verbose) logInfo(`Reading ${filePath} (TZ ${formatOffset(offset)})...`);
        const chat = loadChatExport(filePath, options.encoding);
        if (verbose) logSuccess(`Found ${formatNumber(chat.messages.length)} messages${chat.name ? ` in "${chat.name}"` : ''}`);

        const leaderboard = computeLeaderboard(chat, {
            year: options.year,
            timezone: options.timezone,
            limit: options.limit
        });

        if (options.json) {
            console.log(JSON.stringify(toJSONOutput(leaderboard), null, 2));
        } else if (options.plain) {
            printPlainLeaderboard(leaderboard);
        } else {
            printLeaderboard(leaderboard);
        }
        return 0;
    } catch (error) {
        if (error instanceof LeaderboardError) {
            const cause = error.cause instanceof Error ? error.cause.message : undefined;
            showError(error.message, cause);
            return 1;
        }
        throw error;
    }
}
