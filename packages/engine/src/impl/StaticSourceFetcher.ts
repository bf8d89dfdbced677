/**
 * @fileoverview Static Source Fetcher
 *
 * Serves document bodies from memory. Used for fixtures and tests in
 * place of live network calls; can delay or fail individual URLs to
 * exercise completion order and failure handling.
 *
 * @module @ruleboard/engine/impl/StaticSourceFetcher
 */

import type { SourceFetcher } from "../contracts/SourceFetcher.js";
import type { RawDocument, RuleSource } from "../contracts/RuleSource.js";
import { createFailedDocument } from "../contracts/RuleSource.js";

/**
 * Options for StaticSourceFetcher.
 */
export interface StaticSourceFetcherConfig {
    /** Per-URL delay in milliseconds before the body is returned */
    readonly delays?: Readonly<Record<string, number>>;

    /** URLs that fail as if the network call timed out */
    readonly failing?: readonly string[];

    /** Clock for fetchedAt (default: new Date()) */
    readonly now?: () => Date;
}

/**
 * In-memory SourceFetcher.
 *
 * @example
 * ```typescript
 * const fetcher = new StaticSourceFetcher({
 *     "https://lists.test/hosts.txt": "0.0.0.0 ads.example.com\n",
 * }, { failing: ["https://lists.test/down.txt"] });
 * ```
 */
export class StaticSourceFetcher implements SourceFetcher {
    readonly id = "static-fetcher";

    private readonly bodies: ReadonlyMap<string, string>;
    private readonly config: StaticSourceFetcherConfig;

    /** URLs requested, in call order */
    readonly requested: string[] = [];

    constructor(bodies: Readonly<Record<string, string>>, config: StaticSourceFetcherConfig = {}) {
        this.bodies = new Map(Object.entries(bodies));
        this.config = config;
    }

    async fetch(source: RuleSource): Promise<RawDocument> {
        const now = this.config.now ?? (() => new Date());
        const parts: string[] = [];
        const errors: string[] = [];

        for (const url of source.urls) {
            this.requested.push(url);

            const delay = this.config.delays?.[url] ?? 0;
            if (delay > 0) {
                await new Promise<void>((resolve) => setTimeout(resolve, delay));
            }

            const body = this.bodies.get(url);
            if (this.config.failing?.includes(url)) {
                errors.push(`Timed out: ${url}`);
            }
            else if (body === undefined) {
                errors.push(`HTTP 404: ${url}`);
            }
            else {
                parts.push(body);
            }
        }

        if (parts.length === 0) {
            return createFailedDocument(source, errors.join("; ") || "No URLs configured", now());
        }

        return {
            source,
            body     : parts.join("\n"),
            fetchedAt: now(),
            status   : "success",
        };
    }
}
