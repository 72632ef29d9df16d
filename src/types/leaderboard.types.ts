/**
 * Leaderboard Type Definitions
 */

export type LeaderboardOptions = {
    year: number;
    timezone: string;   // "+0300", "-05:00", ...
    limit: number;
};

/**
 * One ranked, display-ready row
 */
export type LeaderboardEntry = {
    rank: number;
    messageId: number;
    localDate: string;  // "YYYY-MM-DD HH:MM"
    link: string;
    totalReactions: number;
    preview: string;
};

export type Leaderboard = {
    chatName?: string;
    channelId: number;
    year: number;
    timezone: string;
    limit: number;
    totalMessages: number;
    eligibleMessages: number;
    entries: LeaderboardEntry[];
};
