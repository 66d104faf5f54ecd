/**
 * CLI Config File Support
 *
 * A JSON file holding any of the command-line options:
 * - Inputs (paths, extensions)
 * - Filtering (includeHidden, ignoreFilesOnly, ignoreGitignore, ignore, ignoreDefault)
 * - Output (output, lineNumbers, extractSqlite, stats, cwd)
 * - Misc (null, verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigError } from './errors.js';

export interface CliConfig {
    // Inputs
    paths?: string[];
    extensions?: string[];

    // Filtering
    includeHidden?: boolean;
    ignoreFilesOnly?: boolean;
    ignoreGitignore?: boolean;
    ignore?: string[];
    ignoreDefault?: boolean;

    // Output
    output?: string;
    lineNumbers?: boolean;
    extractSqlite?: boolean;
    stats?: boolean;
    cwd?: string;

    // Misc
    null?: boolean;
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'paths', 'extensions',
    'includeHidden', 'ignoreFilesOnly', 'ignoreGitignore', 'ignore', 'ignoreDefault',
    'output', 'lineNumbers', 'extractSqlite', 'stats', 'cwd',
    'null', 'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) {
        throw new ConfigError(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const v of val) {
        if (typeof v !== 'string') throw new ConfigError(`Config "${key}" must be an array of strings`);
        strings.push(v);
    }
    return strings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - Relative `paths` and `cwd` resolve from the config file's directory
 * - Throws ConfigError on a missing file, invalid JSON or a mistyped value
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);
    const fromConfigDir = (p: string) => isAbsolute(p) ? p : resolve(configDir, p);

    // Inputs
    if (obj.paths !== undefined) config.paths = assertStringArray(obj, 'paths').map(fromConfigDir);
    if (obj.extensions !== undefined) config.extensions = assertStringArray(obj, 'extensions');

    // Filtering
    if (obj.includeHidden !== undefined) config.includeHidden = assertBoolean(obj, 'includeHidden');
    if (obj.ignoreFilesOnly !== undefined) config.ignoreFilesOnly = assertBoolean(obj, 'ignoreFilesOnly');
    if (obj.ignoreGitignore !== undefined) config.ignoreGitignore = assertBoolean(obj, 'ignoreGitignore');
    if (obj.ignore !== undefined) config.ignore = assertStringArray(obj, 'ignore');
    if (obj.ignoreDefault !== undefined) config.ignoreDefault = assertBoolean(obj, 'ignoreDefault');

    // Output
    if (obj.output !== undefined) config.output = assertString(obj, 'output');
    if (obj.lineNumbers !== undefined) config.lineNumbers = assertBoolean(obj, 'lineNumbers');
    if (obj.extractSqlite !== undefined) config.extractSqlite = assertBoolean(obj, 'extractSqlite');
    if (obj.stats !== undefined) config.stats = assertBoolean(obj, 'stats');
    if (obj.cwd !== undefined) config.cwd = fromConfigDir(assertString(obj, 'cwd'));

    // Misc
    if (obj.null !== undefined) config.null = assertBoolean(obj, 'null');
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}
