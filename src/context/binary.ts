/**
 * Binary Classifier - decides whether a file is opaque bytes or text.
 *
 * Extension denylist first (no I/O), then a 1KB content probe.
 */

import { closeSync, openSync, readSync } from 'fs';
import { extname } from 'path';
import isBinaryPath from 'is-binary-path';

export type FileClass = 'binary' | 'text';

/** Bytes sampled from the head of the file. */
export const PROBE_SIZE = 1024;

/** Share of high-bit bytes above which a sample counts as binary. */
export const HIGH_BIT_THRESHOLD = 0.3;

/** Databases and logs: not in the generic binary list, never useful as prompt text */
const EXTRA_BINARY_EXTENSIONS: Set<string> = new Set([
    '.db', '.sqlite', '.sqlite3', '.db3', '.mdb', '.accdb',
    '.log',
    '.pyc', '.pyo', '.pyd', '.whl',
    '.wasm',
]);

export function hasBinaryExtension(filePath: string): boolean {
    if (isBinaryPath(filePath)) return true;
    return EXTRA_BINARY_EXTENSIONS.has(extname(filePath).toLowerCase());
}

/**
 * Classify a sample of file bytes: any NUL, or more than 30% of bytes above 127.
 * An empty sample is text.
 */
export function classifySample(sample: Uint8Array): FileClass {
    if (sample.length === 0) return 'text';

    let highBit = 0;
    for (const byte of sample) {
        if (byte === 0) return 'binary';
        if (byte > 127) highBit++;
    }

    return highBit / sample.length > HIGH_BIT_THRESHOLD ? 'binary' : 'text';
}

/**
 * Classify a file on disk. A file that cannot be opened is binary.
 */
export function classifyFile(filePath: string): FileClass {
    if (hasBinaryExtension(filePath)) return 'binary';

    let fd: number;
    try {
        fd = openSync(filePath, 'r');
    } catch {
        return 'binary';
    }

    try {
        const buffer = Buffer.alloc(PROBE_SIZE);
        const bytesRead = readSync(fd, buffer, 0, PROBE_SIZE, 0);
        return classifySample(buffer.subarray(0, bytesRead));
    } catch {
        return 'binary';
    } finally {
        closeSync(fd);
    }
}
