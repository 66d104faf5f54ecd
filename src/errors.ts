/**
 * Error taxonomy.
 *
 * User-correctable errors (bad arguments, bad config) exit with code 2.
 * Anything else that escapes the pipeline exits with code 1.
 */

export type ErrorCode = 'UsageError' | 'ConfigError';

export interface AppErrorOptions {
    cause?: unknown;
}

export class AppError extends Error {
    public readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = this.constructor.name;
        this.code = code;
    }
}

/** No input paths, or an input path that does not exist. */
export class UsageError extends AppError {
    constructor(message: string, options: AppErrorOptions = {}) {
        super('UsageError', message, options);
    }
}

/** Config file missing, unreadable, or holding a value of the wrong type. */
export class ConfigError extends AppError {
    constructor(message: string, options: AppErrorOptions = {}) {
        super('ConfigError', message, options);
    }
}

export function exitCodeFor(error: unknown): number {
    return error instanceof AppError ? 2 : 1;
}
