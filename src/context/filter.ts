/**
 * Ignore Predicate Stack - narrows one directory's entries, layer by layer:
 * 1. Hidden entries (name starts with ".") unless includeHidden
 * 2. Cascading .gitignore rules, when a resolver is active
 * 3. User glob patterns, tested against the bare name and the path relative
 *    to the input root; directories are exempt in files-only mode
 * 4. Required extensions (files only), a literal suffix match on the name
 */

import { join, relative, sep } from 'path';
import { minimatch } from 'minimatch';
import type { GitignoreResolver } from './gitignore.js';

/** Noise dropped by `--ignore` unless `--no-ignore-default` */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
    '.git',
    '.hg',
    '.svn',
    '*.lock',
    'package-lock.json',
    'pnpm-lock.yaml',
    'yarn.lock',
    'LICENSE',
    'LICENSE.*',
    'COPYING',
];

export interface IgnoreContext {
    includeHidden: boolean;
    /** null when gitignore cascading is disabled */
    gitignore: GitignoreResolver | null;
    patterns: readonly string[];
    ignoreFilesOnly: boolean;
    extensions: readonly string[];
}

export interface DirectoryListing {
    dirs: string[];
    files: string[];
}

export function isHidden(name: string): boolean {
    return name.startsWith('.');
}

/**
 * Shell-style wildcard match (`*`, `?`, `[seq]`) against either form of the entry.
 */
export function matchesIgnorePattern(name: string, relativePath: string, patterns: readonly string[]): boolean {
    const rel = sep === '/' ? relativePath : relativePath.split(sep).join('/');

    for (const pattern of patterns) {
        if (!pattern) continue;
        const opts = { dot: true, nocomment: true, nonegate: true };
        if (minimatch(name, pattern, opts)) return true;
        if (rel && minimatch(rel, pattern, opts)) return true;
    }

    return false;
}

export function hasRequiredExtension(name: string, extensions: readonly string[]): boolean {
    if (extensions.length === 0) return true;
    return extensions.some(ext => name.endsWith(ext));
}

/**
 * Apply every layer to the entries of `dir`. `inputRoot` is the top-level
 * input path the traversal started from.
 */
export function filterEntries(
    dir: string,
    listing: DirectoryListing,
    inputRoot: string,
    ctx: IgnoreContext
): DirectoryListing {
    let { dirs, files } = listing;

    if (!ctx.includeHidden) {
        dirs = dirs.filter(d => !isHidden(d));
        files = files.filter(f => !isHidden(f));
    }

    const gitignore = ctx.gitignore;
    if (gitignore) {
        dirs = dirs.filter(d => gitignore.allowed(dir, join(dir, d), inputRoot));
        files = files.filter(f => gitignore.allowed(dir, join(dir, f), inputRoot));
    }

    if (ctx.patterns.length > 0) {
        const ignored = (name: string) =>
            matchesIgnorePattern(name, relative(inputRoot, join(dir, name)), ctx.patterns);

        if (!ctx.ignoreFilesOnly) {
            dirs = dirs.filter(d => !ignored(d));
        }
        files = files.filter(f => !ignored(f));
    }

    files = files.filter(f => hasRequiredExtension(f, ctx.extensions));

    return { dirs, files };
}
