/**
 * Cascading .gitignore resolution.
 *
 * Every directory from the candidate's parent up to the traversal root may
 * contribute a `.gitignore`; files above the root are never read. The closest
 * file with a matching rule decides; a candidate no rule matches is allowed.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import ignore from 'ignore';

type Ignore = ReturnType<typeof ignore>;

/**
 * Pluggable ignore capability consulted by the traversal.
 * `baseDir` is the directory being listed, `candidatePath` one of its entries,
 * `root` the input directory the traversal started from.
 */
export interface GitignoreResolver {
    allowed(baseDir: string, candidatePath: string, root: string): boolean;
}

export class CascadingGitignore implements GitignoreResolver {
    private rules: Map<string, Ignore | null> = new Map();

    allowed(baseDir: string, candidatePath: string, root: string): boolean {
        const candidate = resolve(candidatePath);
        const isDir = isDirectory(candidate);

        for (const dir of ancestorsOf(resolve(baseDir), resolve(root))) {
            const ig = this.rulesFor(dir);
            if (!ig) continue;

            let rel = toPosix(relative(dir, candidate));
            if (!rel || rel.startsWith('..')) continue;
            if (isDir) rel += '/';

            const result = ig.test(rel);
            if (result.ignored) return false;
            if (result.unignored) return true;
        }

        return true;
    }

    private rulesFor(dir: string): Ignore | null {
        const cached = this.rules.get(dir);
        if (cached !== undefined) return cached;

        let ig: Ignore | null = null;
        const file = join(dir, '.gitignore');
        if (existsSync(file)) {
            try {
                ig = ignore().add(readFileSync(file, 'utf-8'));
            } catch {
                ig = null;
            }
        }

        this.rules.set(dir, ig);
        return ig;
    }
}

/** In-memory resolver: drops every candidate whose path is in the set */
export class StaticGitignore implements GitignoreResolver {
    private denied: Set<string>;

    constructor(denied: Iterable<string>) {
        this.denied = new Set(denied);
    }

    allowed(_baseDir: string, candidatePath: string, _root: string): boolean {
        return !this.denied.has(candidatePath);
    }
}

/** `start` and its parents, closest first, up to and including `root`. */
function* ancestorsOf(start: string, root: string): Generator<string> {
    let dir = start;
    while (true) {
        yield dir;
        if (dir === root) return;
        const parent = dirname(dir);
        // Outside the root: only the listed directory's own rules apply
        if (parent === dir || !isWithin(root, parent)) return;
        dir = parent;
    }
}

function isWithin(root: string, dir: string): boolean {
    const rel = relative(root, dir);
    return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

function isDirectory(path: string): boolean {
    try {
        return statSync(path).isDirectory();
    } catch {
        return false;
    }
}

function toPosix(path: string): string {
    return sep === '/' ? path : path.split(sep).join('/');
}
