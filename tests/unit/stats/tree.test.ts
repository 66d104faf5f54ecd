import { describe, it, expect } from 'vitest';
import { StatsTree, splitSegments, sortedChildren, type StatNode } from '../../../src/stats/tree.js';
import { countTokens, createTiktokenEncoder, type TokenEncoder } from '../../../src/stats/tokens.js';

/** One token per whitespace-separated word */
const wordEncoder: TokenEncoder = {
  encode: (text: string) => text.split(/\s+/).filter(Boolean).map(() => 0),
};

function words(n: number): string {
  return Array.from({ length: n }, (_, i) => `w${i}`).join(' ');
}

function subtreeTokens(node: StatNode): number {
  if (node.isFile) return node.tokens;
  let sum = 0;
  for (const child of node.children.values()) sum += subtreeTokens(child);
  return sum;
}

function subtreeFiles(node: StatNode): number {
  if (node.isFile) return node.files;
  let sum = 0;
  for (const child of node.children.values()) sum += subtreeFiles(child);
  return sum;
}

describe('splitSegments', () => {
  it('splits on both separators and drops empty and dot segments', () => {
    expect(splitSegments('./src/lib\\util.ts')).toEqual(['src', 'lib', 'util.ts']);
    expect(splitSegments('/abs/path/')).toEqual(['abs', 'path']);
  });
});

describe('StatsTree', () => {
  it('rolls file counts up into every ancestor', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('src/a.ts', words(3), true);
    tree.record('src/lib/b.ts', words(2), true);
    tree.record('README.md', words(1), true);

    const src = tree.root.children.get('src');
    expect(src?.tokens).toBe(5);
    expect(src?.files).toBe(2);
    expect(src?.children.get('lib')?.tokens).toBe(2);
    expect(tree.root.tokens).toBe(6);

    for (const node of [tree.root, ...tree.root.children.values()]) {
      expect(node.tokens).toBe(subtreeTokens(node));
      expect(node.files).toBe(subtreeFiles(node));
    }
  });

  it('records file sizes in bytes', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('a.txt', 'héllo', true);
    expect(tree.root.children.get('a.txt')?.size).toBe(6);
  });

  it('counts unprocessed files only in the total', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('a.txt', words(4), true);
    tree.record('b.bin', '', false);

    expect(tree.summary()).toEqual({ totalFiles: 2, processedFiles: 1, totalTokens: 4 });
    expect([...tree.root.children.keys()]).toEqual(['a.txt']);
  });

  it('draws directories before files, each sorted by name', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('src/a.ts', words(3), true);
    tree.record('README.md', words(1), true);
    tree.record('src/lib/b.ts', words(2), true);

    expect(tree.renderTree()).toEqual([
      '├─ src/ (5 tokens)',
      '│  ├─ lib/ (2 tokens)',
      '│  │  └─ b.ts (2 tokens)',
      '│  └─ a.ts (3 tokens)',
      '└─ README.md (1 tokens)',
    ]);
  });

  it('sorts children by code unit', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('b.txt', 'x', true);
    tree.record('B.txt', 'x', true);
    tree.record('a.txt', 'x', true);

    expect(sortedChildren(tree.root).map(n => n.name)).toEqual(['B.txt', 'a.txt', 'b.txt']);
  });

  it('ranks files by tokens, keeping insertion order for ties', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('one.txt', words(2), true);
    tree.record('two.txt', words(5), true);
    tree.record('three.txt', words(2), true);

    expect(tree.topFiles()).toEqual([
      { path: 'two.txt', tokens: 5 },
      { path: 'one.txt', tokens: 2 },
      { path: 'three.txt', tokens: 2 },
    ]);
  });

  it('limits the ranking to topN entries', () => {
    const tree = new StatsTree(wordEncoder, { topN: 2 });
    for (let i = 1; i <= 5; i++) tree.record(`f${i}.txt`, words(i), true);

    expect(tree.topFiles().map(f => f.path)).toEqual(['f5.txt', 'f4.txt']);
    expect(tree.render().split('\n').slice(-3)).toEqual([
      'Top 2 files by tokens:',
      '  1. f5.txt (5 tokens)',
      '  2. f4.txt (4 tokens)',
    ]);
  });

  it('renders the full report', () => {
    const tree = new StatsTree(wordEncoder);
    tree.record('proj/a.py', words(10), true);
    tree.record('proj/b.bin', '', false);

    expect(tree.render()).toBe([
      'Total files: 2',
      'Processed files: 1',
      'Total tokens: 10',
      '',
      'Token tree:',
      '└─ proj/ (10 tokens)',
      '   └─ a.py (10 tokens)',
      '',
      'Top 10 files by tokens:',
      '  1. proj/a.py (10 tokens)',
    ].join('\n'));
  });

  it('renders an empty report', () => {
    const tree = new StatsTree(wordEncoder);
    expect(tree.render()).toBe('Total files: 0\nProcessed files: 0\nTotal tokens: 0\n\nToken tree:\n\nTop 10 files by tokens:');
  });
});

describe('createTiktokenEncoder', () => {
  it('counts cl100k_base tokens', () => {
    const encoder = createTiktokenEncoder();
    expect(countTokens(encoder, 'hello world')).toBe(2);
    expect(countTokens(encoder, '')).toBe(0);
  });

  it('treats special-token text as ordinary text', () => {
    const encoder = createTiktokenEncoder();
    expect(() => countTokens(encoder, '<|endoftext|>')).not.toThrow();
  });
});
