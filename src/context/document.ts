/**
 * Document Emitter - one delimited, indexed record per file:
 *
 *   <document path="DISPLAY_PATH" index="N">
 *   CONTENT
 *   </document>
 */

import { isAbsolute, relative, resolve } from 'path';
import type { PromptSession } from './session.js';

/** Receives one unit of output; the sink appends the newline. */
export type Writer = (text: string) => void;

export interface DocumentRecord {
    path: string;
    index: number;
    content: string;
    numbered: boolean;
}

/**
 * Path relative to `rootPath` when the file lives under it, else unchanged.
 */
export function displayPath(filePath: string, rootPath?: string): string {
    if (!rootPath) return filePath;

    const rel = relative(resolve(rootPath), resolve(filePath));
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) return filePath;
    return rel;
}

/**
 * Prefix every line with its right-aligned 1-based number and two spaces.
 * A trailing newline does not start an extra line.
 */
export function addLineNumbers(content: string): string {
    const lines = splitLines(content);
    const width = String(lines.length).length;
    return lines
        .map((line, i) => `${String(i + 1).padStart(width)}  ${line}`)
        .join('\n');
}

/** CRLF, or any single line-boundary character: LF, VT, FF, CR, FS, GS, RS, NEL, LS, PS */
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

function splitLines(content: string): string[] {
    if (content === '') return [];
    const lines = content.split(LINE_BREAK);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

export function formatDocument(record: DocumentRecord): string[] {
    const body = record.numbered ? addLineNumbers(record.content) : record.content;
    return [
        `<document path="${record.path}" index="${record.index}">`,
        body,
        '</document>',
    ];
}

/**
 * Write one record, taking the next index from the session.
 */
export function emitDocument(
    write: Writer,
    session: PromptSession,
    filePath: string,
    content: string,
    numbered: boolean,
    rootPath?: string
): DocumentRecord {
    const record: DocumentRecord = {
        path: displayPath(filePath, rootPath),
        index: session.takeIndex(),
        content,
        numbered,
    };

    for (const line of formatDocument(record)) {
        write(line);
    }

    return record;
}
