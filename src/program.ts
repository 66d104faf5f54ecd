/**
 * prompt-bundle command
 *
 * Takes one or more paths to files or directories and writes every text file,
 * recursively, as a tagged document stream:
 *
 *     <documents>
 *     <document path="path/to/file1.txt" index="1">
 *     Contents of file1.txt
 *     </document>
 *     ...
 *     </documents>
 */

import { Command } from 'commander';
import { closeSync, openSync, readFileSync, writeSync } from 'fs';
import { createRequire } from 'module';
import { resolve } from 'path';
import { loadConfig, type CliConfig } from './config.js';
import { bundlePaths, validatePaths } from './context/gather.js';
import { DEFAULT_IGNORE_PATTERNS } from './context/filter.js';
import type { Writer } from './context/document.js';
import { exitCodeFor } from './errors.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

export interface CliOptions {
    extension: string[];
    includeHidden?: boolean;
    ignoreFilesOnly?: boolean;
    ignoreGitignore?: boolean;
    ignore: string[];
    ignoreDefault: boolean;
    output?: string;
    lineNumbers?: boolean;
    null?: boolean;
    extractSqlite?: boolean;
    stats?: boolean;
    cwd?: string;
    configPath?: string;
    verbose?: boolean;
}

export interface OutputSink {
    write: Writer;
    close(): void;
}

/** Process boundary, swapped out in tests */
export interface ProgramIO {
    /** Raw stdin text, or null when stdin is a terminal */
    readStdin(): string | null;
    openOutput(path?: string): OutputSink;
    setExitCode(code: number): void;
}

export const processIO: ProgramIO = {
    readStdin() {
        if (process.stdin.isTTY) return null;
        return readFileSync(0, 'utf-8');
    },
    openOutput(path?: string) {
        const fd = path ? openSync(resolve(path), 'w') : 1;
        return {
            write: (text: string) => {
                writeSync(fd, `${text}\n`);
            },
            close: () => {
                if (path) closeSync(fd);
            },
        };
    },
    setExitCode(code: number) {
        process.exitCode = code;
    },
};

/**
 * Split a stdin path list on NUL or on whitespace; blank entries are dropped.
 */
export function parsePathList(text: string, nullSeparated: boolean): string[] {
    const parts = nullSeparated ? text.split('\0') : text.split(/\s+/);
    return parts.filter(p => p.trim() !== '');
}

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

/**
 * Fill options the user did not pass on the command line from the config file.
 */
export function applyConfig(options: CliOptions, config: CliConfig, command: Command): CliOptions {
    const merged: CliOptions = { ...options };
    const fromCli = (name: string) => command.getOptionValueSource(name) === 'cli';

    if (config.extensions !== undefined && !fromCli('extension')) merged.extension = config.extensions;
    if (config.includeHidden !== undefined && !fromCli('includeHidden')) merged.includeHidden = config.includeHidden;
    if (config.ignoreFilesOnly !== undefined && !fromCli('ignoreFilesOnly')) merged.ignoreFilesOnly = config.ignoreFilesOnly;
    if (config.ignoreGitignore !== undefined && !fromCli('ignoreGitignore')) merged.ignoreGitignore = config.ignoreGitignore;
    if (config.ignore !== undefined && !fromCli('ignore')) merged.ignore = config.ignore;
    if (config.ignoreDefault !== undefined && !fromCli('ignoreDefault')) merged.ignoreDefault = config.ignoreDefault;
    if (config.output !== undefined && !fromCli('output')) merged.output = config.output;
    if (config.lineNumbers !== undefined && !fromCli('lineNumbers')) merged.lineNumbers = config.lineNumbers;
    if (config.null !== undefined && !fromCli('null')) merged.null = config.null;
    if (config.extractSqlite !== undefined && !fromCli('extractSqlite')) merged.extractSqlite = config.extractSqlite;
    if (config.stats !== undefined && !fromCli('stats')) merged.stats = config.stats;
    if (config.cwd !== undefined && !fromCli('cwd')) merged.cwd = config.cwd;
    if (config.verbose !== undefined && !fromCli('verbose')) merged.verbose = config.verbose;

    return merged;
}

export function createProgram(io: ProgramIO = processIO): Command {
    const program = new Command();

    program
        .name('prompt-bundle')
        .description('Concatenate a directory full of files into a single prompt for use with LLMs')
        .version(pkg.version)
        .argument('[paths...]', 'Files or directories to include')
        .option('-e, --extension <ext>', 'Only include files ending with this suffix (repeatable)', collect, [] as string[])
        .option('--include-hidden', 'Include files and folders starting with .')
        .option('--ignore-files-only', '--ignore patterns only ignore files, never directories')
        .option('--ignore-gitignore', 'Ignore .gitignore files and include all files')
        .option('--ignore <pattern>', 'Glob pattern to ignore (repeatable)', collect, [] as string[])
        .option('--no-ignore-default', 'Do not add the default ignore patterns (VCS dirs, lock files, licenses)')
        .option('-o, --output <file>', 'Output to a file instead of stdout')
        .option('-n, --line-numbers', 'Add line numbers to the output')
        .option('-0, --null', 'Use NUL character as separator when reading paths from stdin')
        .option('--extract-sqlite', 'Extract the schema of SQLite3 database files instead of skipping them')
        .option('--stats', 'Print a token count report instead of the documents')
        .option('--cwd <dir>', 'Show paths relative to this directory')
        .option('--config-path <path>', 'Path to config JSON file')
        .option('--verbose', 'Verbose output on stderr')
        .action((args: string[], cliOptions: CliOptions, command: Command) => {
            try {
                let options = cliOptions;
                let configPaths: string[] = [];

                const configPath = options.configPath;
                if (configPath) {
                    const config = loadConfig(configPath);
                    options = applyConfig(options, config, command);
                    configPaths = config.paths ?? [];
                    if (options.verbose) {
                        console.error(`Config loaded from: ${resolve(configPath)}`);
                    }
                }

                const stdin = io.readStdin();
                const stdinPaths = stdin === null ? [] : parsePathList(stdin, options.null ?? false);
                const paths = [...(args.length > 0 ? args : configPaths), ...stdinPaths];

                validatePaths(paths);

                const ignorePatterns = options.ignoreDefault
                    ? [...DEFAULT_IGNORE_PATTERNS, ...options.ignore]
                    : options.ignore;

                if (options.verbose) {
                    console.error(`Paths: ${paths.join(', ')}`);
                    if (ignorePatterns.length > 0) {
                        console.error(`Ignore patterns: ${ignorePatterns.join(', ')}`);
                    }
                }

                const sink = io.openOutput(options.output);
                try {
                    const result = bundlePaths(paths, sink.write, {
                        extensions: options.extension,
                        includeHidden: options.includeHidden,
                        ignoreFilesOnly: options.ignoreFilesOnly,
                        ignoreGitignore: options.ignoreGitignore,
                        ignorePatterns,
                        lineNumbers: options.lineNumbers,
                        extractSqlite: options.extractSqlite,
                        stats: options.stats,
                        rootPath: options.cwd,
                        verbose: options.verbose,
                    });

                    if (options.verbose) {
                        console.error(`Wrote ${result.documents} document(s), skipped ${result.skipped.length} file(s)`);
                    }
                } finally {
                    sink.close();
                }
            } catch (error) {
                console.error('Error:', error instanceof Error ? error.message : error);
                io.setExitCode(exitCodeFor(error));
            }
        });

    return program;
}
