/**
 * Traversal Engine - turns one input path into the ordered list of files to
 * process.
 *
 * A plain file is its own sole candidate and skips the directory filters.
 * FIFOs, sockets and devices yield nothing.
 * A directory is walked top-down, pruning subdirectories before descending.
 * Everything is deduplicated against the session, then sorted by path string.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { filterEntries, type DirectoryListing, type IgnoreContext } from './filter.js';
import type { PromptSession } from './session.js';

/** Code-unit order, independent of locale */
export function comparePaths(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function resolveFiles(inputPath: string, ctx: IgnoreContext, session: PromptSession): string[] {
    const stats = statSync(inputPath);
    const candidates: string[] = [];

    if (stats.isDirectory()) {
        walkDir(inputPath, inputPath, ctx, candidates);
    } else if (stats.isFile()) {
        candidates.push(inputPath);
    }

    return candidates
        .filter(file => session.claim(file))
        .sort(comparePaths);
}

function walkDir(dir: string, inputRoot: string, ctx: IgnoreContext, out: string[]): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(dir, { withFileTypes: true });
    } catch {
        return;
    }

    const { dirs, files } = filterEntries(dir, splitEntries(dir, entries), inputRoot, ctx);

    for (const file of files) {
        out.push(join(dir, file));
    }

    for (const sub of dirs) {
        walkDir(join(dir, sub), inputRoot, ctx, out);
    }
}

/**
 * Directories are descended, files collected. A symlink to a file counts as a
 * file, a symlink to a directory is not followed, a dangling one is a file.
 */
function splitEntries(dir: string, entries: Dirent[]): DirectoryListing {
    const listing: DirectoryListing = { dirs: [], files: [] };

    for (const entry of entries) {
        if (entry.isDirectory()) {
            listing.dirs.push(entry.name);
        } else if (entry.isFile()) {
            listing.files.push(entry.name);
        } else if (entry.isSymbolicLink()) {
            let target;
            try {
                target = statSync(join(dir, entry.name));
            } catch {
                listing.files.push(entry.name);
                continue;
            }
            if (target.isFile()) listing.files.push(entry.name);
        }
    }

    return listing;
}
