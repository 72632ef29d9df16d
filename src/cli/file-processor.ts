import type { ChatExport } from '../types';
import { readExportFile } from '../utils/file.utils';
import { parseTelegramExport } from '../parsers/telegram.parser';

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * Reads and parses a single Telegram export file
 */
export function loadChatExport(filePath: string, encoding?: string): ChatExport {
    const content = readExportFile(filePath, encoding);
    return parseTelegramExport(content);
}
