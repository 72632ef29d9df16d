/**
 * Date Utilities
 *
 * Local dates are represented as a Date whose UTC fields carry the wall clock of
 * the fixed offset. No timezone database is consulted.
 */

import { MAX_EPOCH_SECONDS, SIGNED_INTEGER_REGEX } from './constants';
import type { ResolvedTimezone } from '../types';

// ============================================================================
// EPOCH PARSING
// ============================================================================

/**
 * Parses a base-10 epoch-seconds string. Returns null for anything that is not an
 * integer or lies outside the range a Date can represent.
 */
export function parseEpochSeconds(value: string | undefined): number | null {
    if (value === undefined || !SIGNED_INTEGER_REGEX.test(value)) {
        return null;
    }

    const seconds = Number(value);
    if (!Number.isSafeInteger(seconds) || Math.abs(seconds) > MAX_EPOCH_SECONDS) {
        return null;
    }

    return seconds;
}

/**
 * Shifts a UTC epoch by a fixed offset. Returns null when the shifted moment
 * falls off the end of the representable range.
 */
export function toLocalDate(epochSeconds: number, offsetSeconds: ResolvedTimezone): Date | null {
    const local = new Date((epochSeconds + offsetSeconds) * 1000);
    return Number.isNaN(local.getTime()) ? null : local;
}

// ============================================================================
// FORMATTING
// ============================================================================

function pad(value: number, length: number = 2): string {
    return value.toString().padStart(length, '0');
}

function formatYear(year: number): string {
    return year < 0 ? `-${pad(-year, 4)}` : pad(year, 4);
}

/**
 * Formats a local date as "YYYY-MM-DD HH:MM" (seconds are dropped)
 */
export function formatLocalDate(date: Date): string {
    const day = `${formatYear(date.getUTCFullYear())}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    return `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/**
 * Formats an offset in seconds back into "+HH:MM"
 */
export function formatOffset(offsetSeconds: ResolvedTimezone): string {
    const sign = offsetSeconds < 0 ? '-' : '+';
    const minutes = Math.floor(Math.abs(offsetSeconds) / 60);
    return `${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
}
