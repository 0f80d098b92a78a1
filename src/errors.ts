/**
 * Error types surfaced to the CLI.
 *
 * Per-file problems never become errors: they are recorded as skipped entries
 * by the walker and reader. Only the project root, the configuration and the
 * clipboard can fail a run (and the clipboard only degrades it).
 */

/** Project root is missing, unreadable, or not a directory. Fatal. */
export class ProjectRootError extends Error {
    constructor(message: string, readonly rootPath: string) {
        super(message);
        this.name = 'ProjectRootError';
    }
}

/** Invalid config file or option value. Fatal. */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

/** No clipboard command worked. The caller falls back to another sink. */
export class ClipboardUnavailableError extends Error {
    constructor(
        message: string,
        readonly attempts: readonly string[] = [],
    ) {
        super(message);
        this.name = 'ClipboardUnavailableError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
