/**
 * @fileoverview HTTP Source Fetcher
 *
 * Fetches rule lists over HTTP(S) with a timeout, a User-Agent header
 * and a simple retry. Composite sources are fetched part by part and
 * concatenated. Never throws: every failure becomes a failed document.
 *
 * @module providers/HttpSourceFetcher
 */

import {
    FetchError,
    createConsoleLogger,
    createFailedDocument,
    errorMessage,
    type EngineLogger,
    type RawDocument,
    type RuleSource,
    type SourceFetcher,
} from "@ruleboard/engine";

/**
 * The subset of the global fetch used here, so tests can inject a stub.
 */
export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/**
 * HttpSourceFetcher configuration.
 */
export interface HttpSourceFetcherConfig {
    /** Per-request timeout in milliseconds (default: 30000) */
    readonly timeoutMs?: number;

    /** Extra attempts after a failure (default: 1) */
    readonly retries?: number;

    /** Pause before a retry in milliseconds (default: 1000) */
    readonly retryDelayMs?: number;

    /** User-Agent header (default: "ruleboard/0.1") */
    readonly userAgent?: string;

    /** fetch implementation (default: global fetch) */
    readonly fetchImpl?: FetchFunction;

    readonly logger?: EngineLogger;

    /** Clock for fetchedAt (default: new Date()) */
    readonly now?: () => Date;
}

/** Script Hub wraps the original URL as `.../_start_/<original>/_end_/<file>` */
const SCRIPT_HUB_PATTERN = /_start_\/(.*?)\/_end_\//;

/**
 * Recover the original list URL from a Script Hub conversion URL.
 * Other URLs are returned unchanged.
 */
export function unwrapScriptHubUrl(url: string): string {
    const match = SCRIPT_HUB_PATTERN.exec(url);
    return match?.[1] ? match[1] : url;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * SourceFetcher over HTTP.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpSourceFetcher({ timeoutMs: 30000, retries: 1 });
 * const doc = await fetcher.fetch({ name: "hBlock", urls: ["https://hblock.molinero.dev/hosts_adblock.txt"] });
 * if (doc.status === "failure") {
 *     console.warn(doc.error);
 * }
 * ```
 */
export class HttpSourceFetcher implements SourceFetcher {
    readonly id = "http-fetcher";

    private readonly config: Required<Omit<HttpSourceFetcherConfig, "fetchImpl" | "logger" | "now">>;
    private readonly fetchImpl: FetchFunction;
    private readonly logger: EngineLogger;
    private readonly now: () => Date;

    constructor(config: HttpSourceFetcherConfig = {}) {
        this.config = {
            timeoutMs   : config.timeoutMs ?? 30000,
            retries     : config.retries ?? 1,
            retryDelayMs: config.retryDelayMs ?? 1000,
            userAgent   : config.userAgent ?? "ruleboard/0.1",
        };
        this.fetchImpl = config.fetchImpl ?? ((url, init) => fetch(url, init));
        this.logger    = config.logger ?? createConsoleLogger("info", "[HttpSourceFetcher]");
        this.now       = config.now ?? (() => new Date());
    }

    async fetch(source: RuleSource): Promise<RawDocument> {
        const parts: string[] = [];
        const errors: string[] = [];

        for (const url of source.urls) {
            try {
                parts.push(await this.fetchUrl(url));
            }
            catch (error) {
                const message = errorMessage(error);
                errors.push(message);
                this.logger.warn("Fetch failed", { source: source.name, url, error: message });
            }
        }

        if (parts.length === 0) {
            return createFailedDocument(source, errors.join("; ") || "No URLs configured", this.now());
        }

        if (errors.length > 0) {
            this.logger.warn("Composite source partially fetched", {
                source : source.name,
                fetched: parts.length,
                failed : errors.length,
            });
        }

        return {
            source,
            body     : parts.join("\n"),
            fetchedAt: this.now(),
            status   : "success",
        };
    }

    /**
     * Fetch one URL with retries.
     *
     * @throws FetchError after the last attempt fails
     */
    async fetchUrl(url: string): Promise<string> {
        const target = unwrapScriptHubUrl(url);
        if (target !== url) {
            this.logger.debug("Unwrapped Script Hub URL", { url, target });
        }

        let lastError: FetchError | undefined;
        for (let attempt = 0; attempt <= this.config.retries; attempt++) {
            if (attempt > 0) {
                this.logger.debug("Retrying", { url: target, attempt });
                await sleep(this.config.retryDelayMs);
            }

            try {
                return await this.fetchOnce(target);
            }
            catch (error) {
                lastError = error instanceof FetchError
                    ? error
                    : new FetchError(errorMessage(error), target, undefined, { cause: error });
            }
        }

        throw lastError ?? new FetchError(`No attempt made: ${target}`, target);
    }

    private async fetchOnce(url: string): Promise<string> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                headers : { "User-Agent": this.config.userAgent },
                signal  : AbortSignal.timeout(this.config.timeoutMs),
                redirect: "follow",
            });
        }
        catch (error) {
            const timedOut = error instanceof Error && error.name === "TimeoutError";
            const message = timedOut
                ? `Timed out after ${this.config.timeoutMs}ms: ${url}`
                : `Request failed: ${url}: ${errorMessage(error)}`;
            throw new FetchError(message, url, undefined, { cause: error });
        }

        if (!response.ok) {
            throw new FetchError(`HTTP ${response.status}: ${url}`, url, response.status);
        }

        return await response.text();
    }
}
