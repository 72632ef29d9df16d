/**
 * CLI Utilities for console output
 */

import { graphemeLength, truncatePreview } from '../utils/text.utils';

// ============================================================================
// ICONS
// ============================================================================

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right';
    truncate?: boolean;     // cut to `width` instead of growing to fit
}

function padCell(text: string, width: number, align: TableColumn['align']): string {
    const padding = ' '.repeat(Math.max(0, width - graphemeLength(text)));
    return align === 'right' ? padding + text : text + padding;
}

/**
 * Lays out rows under columns. A column grows to its widest cell unless it is
 * marked `truncate`, in which case cells are cut with an ellipsis on grapheme
 * boundaries.
 */
export function formatTable(columns: TableColumn[], data: string[][]): string[] {
    const widths = columns.map((col, i) => col.truncate
        ? col.width
        : Math.max(col.width, graphemeLength(col.header), ...data.map(row => graphemeLength(row[i] ?? ''))));

    const rule = (left: string, joint: string, right: string) =>
        `${left}─${widths.map(width => '─'.repeat(width)).join(`─${joint}─`)}─${right}`;

    const headerRow = columns.map((col, i) => padCell(col.header, widths[i], 'left')).join(' │ ');
    const lines = [
        rule('┌', '┬', '┐'),
        `│ ${headerRow} │`,
        rule('├', '┼', '┤')
    ];

    for (const row of data) {
        const formattedRow = columns.map((col, i) => {
            const value = row[i] ?? '';
            const cell = col.truncate ? truncatePreview(value, widths[i]) : value;
            return padCell(cell, widths[i], col.align);
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    }

    lines.push(rule('└', '┴', '┘'));
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of formatTable(columns, data)) {
        console.log(line);
    }
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}
