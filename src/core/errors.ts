/**
 * Error taxonomy for hook runs. Sinks and readers throw these; the
 * dispatcher and entry points catch them and turn them into exit codes.
 */

export class HookError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Required credentials or connection settings are missing or invalid. */
export class ConfigError extends HookError {}

/** Hook stdin was not JSON or did not match the expected shape. */
export class HookInputError extends HookError {}

/** The transcript exists but could not be read. */
export class TranscriptReadError extends HookError {}

/** A primary or fallback sink refused the record. */
export class SinkError extends HookError {}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
        return error.message.endsWith(cause) ? error.message : `${error.message}${cause}`;
    }
    return String(error);
}
