/**
 * Rule Contract
 *
 * The canonical, dialect-independent rule that flows out of the normalizer
 * and into the aggregator and emitter.
 *
 * Design principles:
 * - Canonical: one representation for every input dialect
 * - Immutable: rules are frozen on creation
 * - Identity: two rules are equal when pattern and match kind are equal
 */

import ipaddr from "ipaddr.js";

/**
 * How a pattern is matched against a queried domain.
 *
 * - EXACT: the domain itself
 * - SUFFIX: the domain and every subdomain
 * - KEYWORD: any domain containing the pattern
 */
export type MatchKind = "EXACT" | "SUFFIX" | "KEYWORD";

/**
 * Every match kind, in rendering order.
 */
export const MATCH_KINDS: readonly MatchKind[] = ["EXACT", "SUFFIX", "KEYWORD"];

/**
 * Rule action. Every collected list is a blocking list, so this is fixed.
 */
export type RuleAction = "REJECT";

/**
 * A canonical blocking rule.
 *
 * @example
 * ```typescript
 * { pattern: "ads.example.com", matchKind: "EXACT", action: "REJECT" }
 * { pattern: "tracker.example.com", matchKind: "SUFFIX", action: "REJECT" }
 * ```
 */
export interface Rule {
    /** Lowercase domain, domain suffix or keyword */
    readonly pattern: string;

    /** How the pattern is matched */
    readonly matchKind: MatchKind;

    /** What a client does on match */
    readonly action: RuleAction;
}

/**
 * A domain label: letters (any script), digits, underscore and hyphen.
 * Internationalized labels are kept as-is, not punycode-converted.
 */
const DOMAIN_PATTERN = /^[\p{L}\p{N}_](?:[\p{L}\p{N}_-]*[\p{L}\p{N}_])?(?:\.[\p{L}\p{N}_](?:[\p{L}\p{N}_-]*[\p{L}\p{N}_])?)+$/u;

const KEYWORD_PATTERN = /^[\p{L}\p{N}._-]+$/u;

/** Longest domain name allowed by DNS */
const kMAX_DOMAIN_LENGTH = 253;

/**
 * Names that appear in hosts preambles and system lists but never
 * identify a blockable host.
 */
const RESERVED_NAMES: ReadonlySet<string> = new Set([
    "localhost",
    "localhost.localdomain",
    "local",
    "broadcasthost",
]);

/**
 * Check whether a string is a usable domain for an EXACT or SUFFIX rule.
 *
 * Requires at least one dot, rejects IP literals and reserved names.
 */
export function isValidDomain(value: string): boolean {
    if (!value || value.length > kMAX_DOMAIN_LENGTH) {
        return false;
    }

    if (RESERVED_NAMES.has(value) || ipaddr.isValid(value)) {
        return false;
    }

    return DOMAIN_PATTERN.test(value);
}

/**
 * Check whether a pattern satisfies the rule invariant for its match kind.
 */
export function isValidPattern(pattern: string, matchKind: MatchKind): boolean {
    if (matchKind === "KEYWORD") {
        return KEYWORD_PATTERN.test(pattern);
    }

    return isValidDomain(pattern);
}

/**
 * Create a frozen rule, normalizing the pattern to lowercase and trimmed form.
 *
 * @returns The rule, or null if the pattern violates the invariant
 */
export function createRule(pattern: string, matchKind: MatchKind): Rule | null {
    const normalized = pattern.trim().toLowerCase();

    if (!isValidPattern(normalized, matchKind)) {
        return null;
    }

    return Object.freeze({
        pattern: normalized,
        matchKind,
        action : "REJECT",
    });
}

/**
 * Identity key of a rule. The action is constant and excluded.
 */
export function ruleKey(rule: Pick<Rule, "pattern" | "matchKind">): string {
    return `${rule.matchKind}:${rule.pattern}`;
}

/**
 * Compare two rules by identity.
 */
export function rulesEqual(a: Rule, b: Rule): boolean {
    return a.pattern === b.pattern && a.matchKind === b.matchKind;
}
