/**
 * Bundle pipeline:
 *
 * 1. Validate every input path (nothing is written if one is missing)
 * 2. Resolve each input in argument order: filter stack, dedup, sort
 * 3. Load each file: SQLite schema / binary skip / strict UTF-8 decode
 * 4. Emit a <document> record, or in stats mode feed the stats tree
 * 5. Close the <documents> wrapper, or write the stats report
 *
 * The gitignore resolver and token encoder are injectable for tests.
 */

import { existsSync } from 'fs';
import { UsageError } from '../errors.js';
import { StatsTree, type StatsSummary } from '../stats/tree.js';
import { createTiktokenEncoder, type TokenEncoder } from '../stats/tokens.js';
import { displayPath, emitDocument, type Writer } from './document.js';
import type { IgnoreContext } from './filter.js';
import { CascadingGitignore, type GitignoreResolver } from './gitignore.js';
import { loadFile, type SkipReason } from './reader.js';
import { PromptSession } from './session.js';
import { resolveFiles } from './walk.js';

export interface BundleOptions {
  /** Required filename suffixes, matched literally (e.g. "py", ".md") */
  extensions?: string[];
  includeHidden?: boolean;
  /** Ignore patterns never prune directories, only files */
  ignoreFilesOnly?: boolean;
  /** Disable cascading .gitignore rules */
  ignoreGitignore?: boolean;
  ignorePatterns?: string[];
  lineNumbers?: boolean;
  extractSqlite?: boolean;
  /** Stats-only mode: no documents, a token report instead */
  stats?: boolean;
  /** Declared root for display paths */
  rootPath?: string;
  verbose?: boolean;
  /** Defaults to CascadingGitignore */
  gitignore?: GitignoreResolver;
  /** Defaults to the cl100k_base tokenizer (stats mode only) */
  encoder?: TokenEncoder;
  /** Defaults to a fresh session */
  session?: PromptSession;
}

export interface BundleResult {
  /** Number of <document> records written */
  documents: number;
  /** Display paths of the files that were loaded, in order */
  files: string[];
  skipped: { path: string; reason: SkipReason }[];
  /** Present in stats mode */
  stats?: StatsSummary;
}

/**
 * Throws UsageError when there are no paths or one of them does not exist.
 */
export function validatePaths(paths: string[]): string[] {
  if (paths.length === 0) {
    throw new UsageError('No paths provided');
  }

  for (const p of paths) {
    if (!existsSync(p)) {
      throw new UsageError(`Path does not exist: ${p}`);
    }
  }

  return paths;
}

export function buildIgnoreContext(options: BundleOptions): IgnoreContext {
  return {
    includeHidden: options.includeHidden ?? false,
    gitignore: options.ignoreGitignore ? null : (options.gitignore ?? new CascadingGitignore()),
    patterns: options.ignorePatterns ?? [],
    ignoreFilesOnly: options.ignoreFilesOnly ?? false,
    extensions: options.extensions ?? [],
  };
}

export function bundlePaths(paths: string[], write: Writer, options: BundleOptions = {}): BundleResult {
  const { verbose = false, rootPath } = options;
  validatePaths(paths);

  const ctx = buildIgnoreContext(options);
  const session = options.session ?? new PromptSession();
  const tree = options.stats ? new StatsTree(options.encoder ?? createTiktokenEncoder()) : null;

  const result: BundleResult = { documents: 0, files: [], skipped: [] };
  let opened = false;

  for (const inputPath of paths) {
    const files = resolveFiles(inputPath, ctx, session);

    if (verbose) {
      console.error(`  ${inputPath}: ${files.length} file(s)`);
    }

    for (const filePath of files) {
      const shown = displayPath(filePath, rootPath);
      const loaded = loadFile(filePath, { extractSqlite: options.extractSqlite });

      if (loaded.kind === 'skipped') {
        result.skipped.push({ path: shown, reason: loaded.reason });

        if (loaded.reason === 'sqlite-error') {
          console.warn(`Warning: Error processing SQLite file ${filePath}: ${loaded.message}`);
        } else if (loaded.reason === 'read-error') {
          console.warn(`Warning: Could not read ${filePath}: ${loaded.message}`);
        } else if (verbose) {
          console.error(`  Skipped ${filePath} (${loaded.reason})`);
        }

        // Decode failures are dropped entirely, not counted as seen
        if (loaded.reason !== 'decode-error') {
          tree?.record(shown, '', false);
        }
        continue;
      }

      result.files.push(shown);

      if (tree) {
        tree.record(shown, loaded.content, true);
        continue;
      }

      if (!opened) {
        write('<documents>');
        opened = true;
      }
      emitDocument(write, session, filePath, loaded.content, options.lineNumbers ?? false, rootPath);
      result.documents++;
    }
  }

  if (opened) {
    write('</documents>');
  }

  if (tree) {
    write(tree.render());
    result.stats = tree.summary();
  }

  return result;
}
