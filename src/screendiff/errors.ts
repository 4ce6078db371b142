export type ScreenDiffErrorCode = 'CONFIGURATION' | 'DECODE';

export class ScreenDiffError extends Error {
    readonly code: ScreenDiffErrorCode;

    constructor(code: ScreenDiffErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Aborts the whole run: missing capture root, no run folders, nothing to
 * compare, or invalid settings.
 */
export class ConfigurationError extends ScreenDiffError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONFIGURATION', message, options);
    }
}

/** A single screenshot could not be read or decoded. Skips its pair only. */
export class DecodeError extends ScreenDiffError {
    readonly filePath: string;

    constructor(filePath: string, message: string, options?: { cause?: unknown }) {
        super('DECODE', `${filePath}: ${message}`, options);
        this.filePath = filePath;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
