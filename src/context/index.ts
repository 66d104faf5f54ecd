export { validatePaths, buildIgnoreContext, bundlePaths } from './gather.js';
export type { BundleOptions, BundleResult } from './gather.js';

// Traversal
export { resolveFiles, comparePaths } from './walk.js';
export { PromptSession } from './session.js';

// Filtering
export {
    DEFAULT_IGNORE_PATTERNS,
    filterEntries,
    isHidden,
    matchesIgnorePattern,
    hasRequiredExtension,
} from './filter.js';
export type { IgnoreContext, DirectoryListing } from './filter.js';
export { CascadingGitignore, StaticGitignore } from './gitignore.js';
export type { GitignoreResolver } from './gitignore.js';

// Reading
export { classifyFile, classifySample, hasBinaryExtension } from './binary.js';
export type { FileClass } from './binary.js';
export { loadFile, decodeText } from './reader.js';
export type { LoadResult, SkipReason } from './reader.js';
export { isSqliteFile, extractSqliteSchema } from './sqlite.js';

// Output
export { emitDocument, formatDocument, addLineNumbers, displayPath } from './document.js';
export type { DocumentRecord, Writer } from './document.js';

// Stats
export { StatsTree } from '../stats/tree.js';
export type { StatsSummary, StatNode, RankedFile } from '../stats/tree.js';
export { createTiktokenEncoder, countTokens } from '../stats/tokens.js';
export type { TokenEncoder } from '../stats/tokens.js';
