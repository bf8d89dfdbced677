/**
 * @fileoverview Normalizer
 *
 * Converts a detected document into canonical rules by dispatching
 * every line to the handler for its format, and accounts for each
 * line that did not become a rule.
 *
 * @module @ruleboard/engine/normalize/Normalizer
 */

import type { KnownFormat } from "../contracts/Format.js";
import type { Rule } from "../contracts/Rule.js";
import type { RawDocument } from "../contracts/RuleSource.js";
import { FORMAT_HANDLERS } from "../formats/index.js";
import { splitLines } from "../formats/lines.js";

/**
 * What to do with hosts entries that point at a real address.
 *
 * - drop: count and report them, emit nothing
 * - include: count and report them, and treat them as blocks
 */
export type RedirectPolicy = "drop" | "include";

/**
 * Normalizer tuning.
 */
export interface NormalizerConfig {
    /** Hosts redirect handling (default: "drop") */
    readonly hostsRedirects?: RedirectPolicy;

    /** Skip rate above which a document is flagged (default: 0.5) */
    readonly misdetectionThreshold?: number;
}

/**
 * Per-document line accounting.
 */
export interface NormalizeStats {
    /** All lines in the document */
    readonly lines: number;

    /** Rules produced (before deduplication) */
    readonly rules: number;

    /** Blank lines, comments, exceptions, cosmetics, preamble entries */
    readonly ignored: number;

    /** Lines not valid under the format, plus invalid names on otherwise valid lines */
    readonly malformed: number;

    /** Valid lines with no canonical equivalent */
    readonly unsupported: number;

    /** Hosts entries pointing at a non-blocking address */
    readonly redirects: number;
}

/**
 * A hosts redirect encountered during normalization.
 */
export interface RedirectEntry {
    readonly target: string;
    readonly pattern: string;
}

/**
 * Result of normalizing one document.
 */
export interface NormalizeResult {
    readonly format: KnownFormat;
    readonly rules: readonly Rule[];
    readonly stats: NormalizeStats;

    /** malformed / (rules + redirects + malformed); 0 when nothing was parsed */
    readonly skipRate: number;

    /** skipRate exceeded the configured threshold */
    readonly suspectedMisdetection: boolean;

    readonly redirects: readonly RedirectEntry[];
}

/**
 * Normalizer.
 *
 * @example
 * ```typescript
 * const normalizer = new Normalizer({ hostsRedirects: "drop" });
 * const result = normalizer.normalize("0.0.0.0 ads.example.com", "HOSTS");
 * // result.rules => [{ pattern: "ads.example.com", matchKind: "EXACT", action: "REJECT" }]
 * ```
 */
export class Normalizer {
    private readonly config: Required<NormalizerConfig>;

    constructor(config: NormalizerConfig = {}) {
        this.config = {
            hostsRedirects       : config.hostsRedirects ?? "drop",
            misdetectionThreshold: config.misdetectionThreshold ?? 0.5,
        };
    }

    /**
     * Normalize a fetched document. Failed documents yield no rules.
     */
    normalizeDocument(doc: RawDocument, format: KnownFormat): NormalizeResult {
        return this.normalize(doc.status === "success" ? doc.body : "", format);
    }

    /**
     * Normalize a document body under a known format.
     */
    normalize(body: string, format: KnownFormat): NormalizeResult {
        const handler = FORMAT_HANDLERS[format];
        const rules: Rule[] = [];
        const redirects: RedirectEntry[] = [];
        const lines = body ? splitLines(body) : [];

        let ignored = 0;
        let malformed = 0;
        let unsupported = 0;
        let redirectLines = 0;

        for (const line of lines) {
            const result = handler.parseLine(line);

            switch (result.kind) {
                case "rule":
                    rules.push(...result.rules);
                    malformed += result.rejected ?? 0;
                    break;
                case "redirect":
                    redirectLines++;
                    malformed += result.rejected ?? 0;
                    for (const rule of result.rules) {
                        redirects.push({ target: result.target, pattern: rule.pattern });
                    }
                    if (this.config.hostsRedirects === "include") {
                        rules.push(...result.rules);
                    }
                    break;
                case "ignored":
                    ignored++;
                    break;
                case "malformed":
                    malformed++;
                    break;
                case "unsupported":
                    unsupported++;
                    break;
                default: {
                    const unreachable: never = result;
                    throw new Error(`Unhandled line result: ${JSON.stringify(unreachable)}`);
                }
            }
        }

        const parsed = rules.length + (this.config.hostsRedirects === "include" ? 0 : redirects.length) + malformed;
        const skipRate = parsed === 0 ? 0 : malformed / parsed;

        return {
            format,
            rules,
            stats: {
                lines    : lines.length,
                rules    : rules.length,
                ignored,
                malformed,
                unsupported,
                redirects: redirectLines,
            },
            skipRate,
            suspectedMisdetection: skipRate > this.config.misdetectionThreshold,
            redirects,
        };
    }
}
