/**
 * Stats Tree - per-file token counts rolled up into a directory tree.
 *
 * Every insertion adds to each ancestor on the way down, so a directory's
 * counts always equal the sum over its subtree.
 */

import { countTokens, type TokenEncoder } from './tokens.js';

export interface StatNode {
    name: string;
    isFile: boolean;
    files: number;
    tokens: number;
    processed: number;
    /** Content size in bytes (files only) */
    size?: number;
    children: Map<string, StatNode>;
}

export interface StatsSummary {
    totalFiles: number;
    processedFiles: number;
    totalTokens: number;
}

export interface RankedFile {
    path: string;
    tokens: number;
}

export interface StatsTreeOptions {
    /** Size of the top-files report (default: 10) */
    topN?: number;
}

function createNode(name: string, isFile: boolean): StatNode {
    return { name, isFile, files: 0, tokens: 0, processed: 0, children: new Map() };
}

export function splitSegments(path: string): string[] {
    return path.split(/[/\\]/).filter(seg => seg !== '' && seg !== '.');
}

export class StatsTree {
    readonly root: StatNode = createNode('', false);
    private ranked: RankedFile[] = [];
    private totals: StatsSummary = { totalFiles: 0, processedFiles: 0, totalTokens: 0 };
    private topN: number;

    constructor(private encoder: TokenEncoder, options: StatsTreeOptions = {}) {
        this.topN = options.topN ?? 10;
    }

    /**
     * Insert one file. `path` is already the display path. Unprocessed files
     * (binary, failed extraction) only count toward the total seen.
     */
    record(path: string, content: string, processed: boolean): void {
        this.totals.totalFiles++;
        if (!processed) return;

        const segments = splitSegments(path);
        if (segments.length === 0) return;

        const tokens = countTokens(this.encoder, content);
        this.totals.processedFiles++;
        this.totals.totalTokens += tokens;
        this.ranked.push({ path, tokens });

        let node = this.root;
        bump(node, tokens);

        for (const [i, segment] of segments.entries()) {
            const isFile = i === segments.length - 1;
            let child = node.children.get(segment);
            if (!child) {
                child = createNode(segment, isFile);
                node.children.set(segment, child);
            }
            bump(child, tokens);
            node = child;
        }

        node.size = (node.size ?? 0) + Buffer.byteLength(content, 'utf-8');
    }

    summary(): StatsSummary {
        return { ...this.totals };
    }

    /** Highest token counts first; equal counts keep insertion order. */
    topFiles(): RankedFile[] {
        return [...this.ranked]
            .sort((a, b) => b.tokens - a.tokens)
            .slice(0, this.topN);
    }

    renderTree(): string[] {
        return [...renderChildren(this.root, '')];
    }

    render(): string {
        const { totalFiles, processedFiles, totalTokens } = this.totals;
        const lines: string[] = [
            `Total files: ${totalFiles}`,
            `Processed files: ${processedFiles}`,
            `Total tokens: ${totalTokens}`,
            '',
            'Token tree:',
            ...this.renderTree(),
            '',
            `Top ${this.topN} files by tokens:`,
        ];

        for (const [i, file] of this.topFiles().entries()) {
            lines.push(`${String(i + 1).padStart(3)}. ${file.path} (${file.tokens} tokens)`);
        }

        return lines.join('\n');
    }
}

function bump(node: StatNode, tokens: number): void {
    node.files++;
    node.processed++;
    node.tokens += tokens;
}

/** Directories before files, each group by name. */
export function sortedChildren(node: StatNode): StatNode[] {
    return [...node.children.values()].sort((a, b) => {
        if (a.isFile !== b.isFile) return a.isFile ? 1 : -1;
        if (a.name < b.name) return -1;
        if (a.name > b.name) return 1;
        return 0;
    });
}

function* renderChildren(node: StatNode, prefix: string): Generator<string> {
    const children = sortedChildren(node);

    for (let i = 0; i < children.length; i++) {
        const child = children[i];
        const isLast = i === children.length - 1;
        const connector = isLast ? '└─ ' : '├─ ';
        const childPrefix = isLast ? '   ' : '│  ';
        const label = child.isFile ? child.name : `${child.name}/`;

        yield `${prefix}${connector}${label} (${child.tokens} tokens)`;

        if (!child.isFile) {
            yield* renderChildren(child, `${prefix}${childPrefix}`);
        }
    }
}
