import type { ResolvedTimezone } from '../types';
import {
    INT32_MAX,
    INT32_MIN,
    SECONDS_PER_DAY,
    SECONDS_PER_HOUR,
    SECONDS_PER_MINUTE,
    SIGNED_INTEGER_REGEX
} from '../utils/constants';
import { InvalidTimezoneFormatError, InvalidTimezoneOffsetError } from '../utils/errors';

// ============================================================================
// TIMEZONE RESOLUTION
// ============================================================================

/**
 * Resolves a fixed offset written as ±HHMM or ±HH:MM into seconds east of UTC.
 *
 * The digits are read as one packed number (hours * 100 + minutes), so "+0530"
 * is 5h30m and "-0030" is minus thirty minutes. Minutes of 60 or more are
 * rejected rather than carried into the hour.
 */
export function resolveTimezone(offset: string): ResolvedTimezone {
    const digits = offset.replace(/:/g, '');
    if (!SIGNED_INTEGER_REGEX.test(digits)) {
        throw new InvalidTimezoneFormatError(offset);
    }

    const packed = Number(digits);
    if (packed < INT32_MIN || packed > INT32_MAX) {
        throw new InvalidTimezoneFormatError(offset);
    }

    const hours = Math.trunc(packed / 100);
    const minutes = packed % 100;
    if (Math.abs(minutes) >= 60) {
        throw new InvalidTimezoneOffsetError(offset);
    }

    const offsetSeconds = hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE;
    if (Math.abs(offsetSeconds) >= SECONDS_PER_DAY) {
        throw new InvalidTimezoneOffsetError(offset);
    }

    // "-0000" parses to -0
    return offsetSeconds === 0 ? 0 : offsetSeconds;
}
