/**
 * Rule Source Contract
 *
 * A configured upstream list and the raw document fetched from it.
 * Sources are static configuration; documents exist for one run only.
 */

import type { KnownFormat } from "./Format.js";

/**
 * A configured upstream rule list.
 *
 * A composite source lists several URLs. Their bodies are fetched in
 * order and concatenated before detection.
 *
 * @example
 * ```typescript
 * const source: RuleSource = {
 *     name: "AdGuard DNS filter",
 *     urls: ["https://adguardteam.github.io/AdGuardSDNSFilter/Filters/filter.txt"],
 *     format: "ADBLOCK",
 * };
 * ```
 */
export interface RuleSource {
    /** Unique, human-readable identifier */
    readonly name: string;

    /** One URL, or several for a composite source */
    readonly urls: readonly string[];

    /** Format hint; when present detection is skipped */
    readonly format?: KnownFormat;

    /** Keep the source in configuration without fetching it */
    readonly skip?: boolean;
}

/**
 * Whether a fetch produced a usable body.
 */
export type FetchStatus = "success" | "failure";

/**
 * Raw text retrieved for a source.
 */
export interface RawDocument {
    /** The source this document was fetched for */
    readonly source: RuleSource;

    /** Response text; empty when status is failure */
    readonly body: string;

    /** When the fetch finished */
    readonly fetchedAt: Date;

    /** Fetch outcome */
    readonly status: FetchStatus;

    /** Failure description when status is failure */
    readonly error?: string;
}

/**
 * Factory for a failed document.
 */
export function createFailedDocument(source: RuleSource, error: string, fetchedAt = new Date()): RawDocument {
    return {
        source,
        body  : "",
        fetchedAt,
        status: "failure",
        error,
    };
}
