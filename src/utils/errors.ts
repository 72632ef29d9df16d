/**
 * Error types surfaced to the CLI. Any of these aborts the run before output.
 */

export class LeaderboardError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidTimezoneFormatError extends LeaderboardError {
    constructor(readonly input: string) {
        super(`Invalid timezone format "${input}". Use an offset like +0300 or -05:00`);
    }
}

export class InvalidTimezoneOffsetError extends LeaderboardError {
    constructor(readonly input: string) {
        super(`Invalid timezone offset "${input}". Minutes must be below 60 and the offset within ±23:59`);
    }
}

export class InvalidLimitError extends LeaderboardError {
    constructor(readonly limit: number) {
        super(`Invalid limit ${limit}. Expected a non-negative integer`);
    }
}

export class ExportReadError extends LeaderboardError {
    constructor(readonly filePath: string, cause?: unknown) {
        super(`Could not read export file: ${filePath}`, { cause });
    }
}

export class ExportFormatError extends LeaderboardError {}
