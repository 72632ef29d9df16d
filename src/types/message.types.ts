/**
 * Message and Export Type Definitions
 */

/**
 * A single reaction bucket on a message. Only the count matters for ranking.
 */
export type Reaction = {
    count: number;
    emoji?: string;
};

/**
 * A message record as found in the export, after shape checks.
 */
export type RawMessage = {
    id: number;
    timestamp?: string;         // epoch seconds, as exported in `date_unixtime`
    reactions: Reaction[];
    kind: string;               // "message", "service", ...
    text: string;
};

/**
 * Complete exported chat
 */
export type ChatExport = {
    name?: string;
    id: number;
    messages: RawMessage[];
};

/**
 * Signed offset from UTC in seconds
 */
export type ResolvedTimezone = number;

/**
 * A message that passed every filter for the target year
 */
export type ProcessedMessage = {
    readonly id: number;
    readonly totalReactions: number;
    readonly localDate: Date;   // UTC fields hold the offset-adjusted wall clock
    readonly text: string;
};
