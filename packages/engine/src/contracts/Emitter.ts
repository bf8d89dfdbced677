/**
 * Emitter Contract
 *
 * Renderers turn the aggregated rule set into one output dialect.
 * Each emission target is an independent render of the same set.
 *
 * Design principles:
 * - Declarative: a renderer states which match kinds it can express
 * - Deterministic: no wall-clock data in rule files
 * - Atomic: the emitter replaces a destination in one rename
 */

import type { MatchKind, Rule } from "./Rule.js";

/**
 * Output dialects.
 */
export type Dialect =
    | "loon-list"
    | "loon-rules"
    | "loon-config"
    | "clash-provider"
    | "domains"
    | "hosts"
    | "adblock";

/**
 * Every dialect, for validation.
 */
export const DIALECTS: readonly Dialect[] = [
    "loon-list",
    "loon-rules",
    "loon-config",
    "clash-provider",
    "domains",
    "hosts",
    "adblock",
];

/**
 * Where and how to write one output file.
 */
export interface EmissionTarget {
    /** Output dialect */
    readonly dialect: Dialect;

    /** Absolute destination path */
    readonly destination: string;

    /**
     * Fixed template text for dialects that embed rules in a larger
     * document. Must contain a line reading `{{RULES}}`.
     */
    readonly template?: string;
}

/**
 * Data shared by every render of one run.
 */
export interface EmitContext {
    /** Title written in the output header */
    readonly title: string;

    /** Rule tag used by dialects that carry one */
    readonly tag: string;

    /** Names of the sources that contributed rules, in configured order */
    readonly sourceNames: readonly string[];
}

/**
 * Renderer for one dialect.
 *
 * @example
 * ```typescript
 * const hostsRenderer: DialectRenderer = {
 *     dialect: "hosts",
 *     kinds: ["EXACT"],
 *     renderRule: (rule) => `0.0.0.0 ${rule.pattern}`,
 *     renderDocument: (lines, context) => [...header(context, lines.length), ...lines].join("\n") + "\n",
 * };
 * ```
 */
export interface DialectRenderer {
    /** The dialect this renderer produces */
    readonly dialect: Dialect;

    /** Match kinds this dialect can express; other rules are omitted */
    readonly kinds: readonly MatchKind[];

    /**
     * Render one rule as a line (without newline).
     */
    renderRule(rule: Rule, context: EmitContext): string;

    /**
     * Assemble the full file from rendered rule lines.
     * Must end with exactly one trailing newline.
     *
     * @throws Error if a required template is missing or invalid
     */
    renderDocument(lines: readonly string[], context: EmitContext, target: EmissionTarget): string;
}

/**
 * Result of emitting one target.
 */
export interface EmitResult {
    /** Dialect of the target */
    readonly dialect: Dialect;

    /** Destination path */
    readonly destination: string;

    /** Whether the file was replaced */
    readonly success: boolean;

    /** Rules written */
    readonly written: number;

    /** Rules the dialect cannot express */
    readonly omitted: number;

    /** Bytes written */
    readonly bytes: number;

    /** Error message if the write failed */
    readonly error?: string;
}

/**
 * Type guard for dialect names read from configuration.
 */
export function isDialect(value: unknown): value is Dialect {
    return typeof value === "string" && (DIALECTS as readonly string[]).includes(value);
}
