/**
 * Per-invocation state shared by the traversal and the document emitter:
 * the set of files already yielded and the document sequence counter.
 *
 * One session per bundle run. Reusing the engine for another run means a new
 * session (or reset()).
 */

import { resolve } from 'path';

export class PromptSession {
    private seen: Set<string> = new Set();
    private nextIndex = 1;

    /**
     * Mark a file as yielded. Returns false when the same file (compared by
     * absolute path) was already claimed in this session.
     */
    claim(filePath: string): boolean {
        const key = resolve(filePath);
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
    }

    hasSeen(filePath: string): boolean {
        return this.seen.has(resolve(filePath));
    }

    /** Next 1-based document index. Never reused within the session. */
    takeIndex(): number {
        return this.nextIndex++;
    }

    get documentCount(): number {
        return this.nextIndex - 1;
    }

    get seenCount(): number {
        return this.seen.size;
    }

    reset(): void {
        this.seen.clear();
        this.nextIndex = 1;
    }
}
