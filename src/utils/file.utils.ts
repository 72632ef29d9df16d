/**
 * File Utilities
 */

import fs from "node:fs";
import * as iconv from 'iconv-lite';
import { DEFAULT_ENCODING } from './constants';
import { ExportReadError } from './errors';

// ============================================================================
// FILE READING
// ============================================================================

/**
 * Reads an export file in one go and decodes it. A leading BOM is dropped.
 */
export function readExportFile(filePath: string, encoding: string = DEFAULT_ENCODING): string {
    if (!iconv.encodingExists(encoding)) {
        throw new ExportReadError(filePath, new Error(`Unknown encoding: ${encoding}`));
    }

    let buffer: Buffer;
    try {
        buffer = fs.readFileSync(filePath);
    } catch (error) {
        throw new ExportReadError(filePath, error);
    }

    return iconv.decode(buffer, encoding);
}
