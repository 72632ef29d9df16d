/**
 * Constants and Configuration Values
 */

// ============================================================================
// CLI DEFAULTS
// ============================================================================

export const DEFAULT_TIMEZONE = "+0000";
export const DEFAULT_LIMIT = 5;
export const DEFAULT_ENCODING = "utf8";

// ============================================================================
// EXPORT FORMAT
// ============================================================================

// Only records of this type are ranked; everything else is a service message
export const MESSAGE_KIND = "message";

// Broadcast channels and supergroups are exported as -100<realId>
export const CHANNEL_ID_PREFIX = "-100";
export const MESSAGE_LINK_BASE = "https://t.me/c";

// ============================================================================
// TIME
// ============================================================================

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86_400;

// Largest magnitude a JavaScript Date can hold, in seconds
export const MAX_EPOCH_SECONDS = 8_640_000_000_000;

export const INT32_MIN = -2_147_483_648;
export const INT32_MAX = 2_147_483_647;

// ============================================================================
// DISPLAY
// ============================================================================

export const PREVIEW_LENGTH = 60;

// ============================================================================
// REGEX PATTERNS
// ============================================================================

export const SIGNED_INTEGER_REGEX = /^[+-]?\d+$/;

// Control & direction marks often found in exported text (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;
