/**
 * Pipeline error types.
 *
 * Fetch and detection failures are per-source and never escape the
 * pipeline; they are carried as data in the run summary. These classes
 * mark the places that do throw.
 */

/**
 * Error categories.
 */
export type RuleboardErrorKind = "fetch" | "write" | "config";

/**
 * Base class for pipeline errors.
 */
export class RuleboardError extends Error {
    constructor(
        message: string,
        public readonly kind: RuleboardErrorKind,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "RuleboardError";
    }
}

/**
 * Network failure, timeout, or non-success HTTP status.
 */
export class FetchError extends RuleboardError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, "fetch", options);
        this.name = "FetchError";
    }
}

/**
 * A failed write of one emission target.
 */
export class WriteError extends RuleboardError {
    constructor(message: string, public readonly destination: string, options?: { cause?: unknown }) {
        super(message, "write", options);
        this.name = "WriteError";
    }
}

/**
 * Invalid or missing configuration.
 */
export class ConfigError extends RuleboardError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "config", options);
        this.name = "ConfigError";
    }
}

/**
 * Render any thrown value as a message.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
