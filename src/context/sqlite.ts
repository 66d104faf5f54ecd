/**
 * SQLite databases are rendered as their schema instead of being skipped as binary.
 */

import { closeSync, openSync, readSync } from 'fs';
import Database from 'better-sqlite3';

const SQLITE_HEADER = 'SQLite format 3';

interface SchemaRow {
    name: string;
    sql: string | null;
}

/** True when the first 16 bytes carry the SQLite 3 header. Unreadable files are not SQLite. */
export function isSqliteFile(filePath: string): boolean {
    let fd: number;
    try {
        fd = openSync(filePath, 'r');
    } catch {
        return false;
    }

    try {
        const header = Buffer.alloc(16);
        const bytesRead = readSync(fd, header, 0, 16, 0);
        return header.subarray(0, bytesRead).toString('latin1').startsWith(SQLITE_HEADER);
    } catch {
        return false;
    } finally {
        closeSync(fd);
    }
}

/**
 * Tables, views and user indexes, each group ordered by name.
 * Throws when the database cannot be opened or queried.
 */
export function extractSqliteSchema(filePath: string): string {
    const db = new Database(filePath, { readonly: true, fileMustExist: true });

    try {
        const query = (where: string) =>
            db.prepare<[], SchemaRow>(`SELECT name, sql FROM sqlite_master WHERE ${where} ORDER BY name`).all();

        const tables = query(`type='table'`);
        const views = query(`type='view'`);
        const indexes = query(`type='index' AND name NOT LIKE 'sqlite_%'`);

        const parts: string[] = [];

        if (tables.length > 0) {
            parts.push('-- Tables');
            for (const t of tables) parts.push(`${t.sql};`);
        }
        if (views.length > 0) {
            parts.push('\n-- Views');
            for (const v of views) parts.push(`${v.sql};`);
        }
        if (indexes.length > 0) {
            parts.push('\n-- Indexes');
            for (const idx of indexes) parts.push(`${idx.sql};`);
        }

        return parts.join('\n');
    } finally {
        db.close();
    }
}

export function formatSqliteDocument(schema: string): string {
    return `-- SQLite3 Database Schema\n${schema}`;
}
