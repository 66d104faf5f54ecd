/**
 * File Reader - loads the content of one resolved file.
 *
 * SQLite databases (when extraction is on) become their schema, binary files
 * are skipped, anything else is decoded as strict UTF-8. A read failure after
 * the probe is a read-error, invalid UTF-8 a decode-error.
 */

import { readFileSync } from 'fs';
import { classifyFile } from './binary.js';
import { extractSqliteSchema, formatSqliteDocument, isSqliteFile } from './sqlite.js';

export type SkipReason = 'binary' | 'read-error' | 'decode-error' | 'sqlite-error';

export type LoadResult =
    | { kind: 'text'; content: string }
    | { kind: 'skipped'; reason: SkipReason; message?: string };

export interface LoadOptions {
    extractSqlite?: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode bytes as UTF-8, throwing on invalid sequences. A leading BOM is dropped.
 */
export function decodeText(bytes: Uint8Array): string {
    return utf8.decode(bytes);
}

export function loadFile(filePath: string, options: LoadOptions = {}): LoadResult {
    if (options.extractSqlite && isSqliteFile(filePath)) {
        try {
            return { kind: 'text', content: formatSqliteDocument(extractSqliteSchema(filePath)) };
        } catch (error) {
            return {
                kind: 'skipped',
                reason: 'sqlite-error',
                message: errorMessage(error),
            };
        }
    }

    if (classifyFile(filePath) === 'binary') {
        return { kind: 'skipped', reason: 'binary' };
    }

    let bytes: Buffer;
    try {
        bytes = readFileSync(filePath);
    } catch (error) {
        return { kind: 'skipped', reason: 'read-error', message: errorMessage(error) };
    }

    try {
        return { kind: 'text', content: decodeText(bytes) };
    } catch (error) {
        return { kind: 'skipped', reason: 'decode-error', message: errorMessage(error) };
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
