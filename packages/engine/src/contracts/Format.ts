/**
 * Format Handler Contract
 *
 * A format handler knows one input dialect: how to recognize its lines
 * during detection and how to turn each line into a canonical rule.
 *
 * Design principles:
 * - Closed set: formats are a union, handlers live in an exhaustive registry
 * - Line-oriented: handlers see one trimmed line at a time
 * - Pure: no I/O, no shared state between lines
 */

import type { Rule } from "./Rule.js";

/**
 * Every format the detector can report.
 */
export type Format = "HOSTS" | "SURGE_LOON" | "ADBLOCK" | "PLAIN" | "UNKNOWN";

/**
 * Formats that have a handler. UNKNOWN documents are never normalized.
 */
export type KnownFormat = Exclude<Format, "UNKNOWN">;

/**
 * Detection priority, most specific first.
 */
export const FORMAT_PRIORITY: readonly KnownFormat[] = ["HOSTS", "SURGE_LOON", "ADBLOCK", "PLAIN"];

/**
 * Outcome of parsing a single line.
 *
 * - rule: one or more rules were produced; `rejected` counts entries on
 *   the same line that were not valid
 * - ignored: blank, comment, or intentionally dropped syntax (exceptions, cosmetics)
 * - malformed: the line is not valid under this format
 * - unsupported: a valid line with no canonical equivalent (e.g. IP-CIDR)
 * - redirect: a hosts entry pointing at a real address instead of a block marker
 */
export type LineResult =
    | { readonly kind: "rule"; readonly rules: readonly Rule[]; readonly rejected?: number }
    | { readonly kind: "ignored" }
    | { readonly kind: "malformed" }
    | { readonly kind: "unsupported" }
    | { readonly kind: "redirect"; readonly target: string; readonly rules: readonly Rule[]; readonly rejected?: number };

/**
 * Format handler interface.
 *
 * @example
 * ```typescript
 * const plainHandler: FormatHandler = {
 *     format: "PLAIN",
 *     matches: (line) => isValidDomain(line),
 *     parseLine(line) {
 *         const rule = createRule(line, "EXACT");
 *         return rule ? { kind: "rule", rules: [rule] } : { kind: "malformed" };
 *     },
 * };
 * ```
 */
export interface FormatHandler {
    /** The format this handler parses */
    readonly format: KnownFormat;

    /**
     * Structural check used by the detector on sampled, non-comment lines.
     */
    matches(line: string): boolean;

    /**
     * Parse one line of a document detected as this format.
     *
     * @param line - The raw line (may include surrounding whitespace)
     */
    parseLine(line: string): LineResult;
}

/**
 * Check whether a line is a comment in any supported dialect.
 * Bracketed lines cover `[Adblock Plus 2.0]` style headers.
 */
export function isCommentLine(line: string): boolean {
    return (
        line.startsWith("#") ||
        line.startsWith("!") ||
        line.startsWith("//") ||
        line.startsWith(";") ||
        line.startsWith("[")
    );
}

/**
 * Map a lowercase configuration name to a format.
 */
export function parseFormatName(name: string): KnownFormat | null {
    switch (name.trim().toLowerCase()) {
        case "hosts":
            return "HOSTS";
        case "surge-loon":
        case "surge":
        case "loon":
            return "SURGE_LOON";
        case "adblock":
            return "ADBLOCK";
        case "plain":
            return "PLAIN";
        default:
            return null;
    }
}
