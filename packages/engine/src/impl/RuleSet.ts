/**
 * @fileoverview RuleSet
 *
 * Ordered collection of unique rules. Identity is (pattern, matchKind);
 * the first occurrence of a key fixes its position and later duplicates
 * are dropped.
 *
 * @module @ruleboard/engine/impl/RuleSet
 */

import type { MatchKind, Rule } from "../contracts/Rule.js";
import { ruleKey } from "../contracts/Rule.js";

/**
 * Insertion-ordered, deduplicating rule collection.
 *
 * @example
 * ```typescript
 * const set = new RuleSet();
 * set.add(rule);        // true
 * set.add(sameRule);    // false, position unchanged
 * set.freeze();
 * set.add(otherRule);   // throws
 * ```
 */
export class RuleSet implements Iterable<Rule> {
    // Map preserves insertion order
    private readonly rules: Map<string, Rule> = new Map();
    private frozen = false;

    constructor(rules: Iterable<Rule> = []) {
        for (const rule of rules) {
            this.add(rule);
        }
    }

    /**
     * Insert a rule unless its key is already present.
     *
     * @returns true if the rule was added
     * @throws Error if the set has been frozen
     */
    add(rule: Rule): boolean {
        if (this.frozen) {
            throw new Error("RuleSet is frozen");
        }

        const key = ruleKey(rule);
        if (this.rules.has(key)) {
            return false;
        }

        this.rules.set(key, rule);
        return true;
    }

    has(rule: Pick<Rule, "pattern" | "matchKind">): boolean {
        return this.rules.has(ruleKey(rule));
    }

    get size(): number {
        return this.rules.size;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Forbid further insertions. Idempotent.
     */
    freeze(): this {
        this.frozen = true;
        return this;
    }

    /**
     * Count of rules per match kind.
     */
    countByKind(): Record<MatchKind, number> {
        const counts: Record<MatchKind, number> = { EXACT: 0, SUFFIX: 0, KEYWORD: 0 };
        for (const rule of this.rules.values()) {
            counts[rule.matchKind]++;
        }
        return counts;
    }

    toArray(): Rule[] {
        return [...this.rules.values()];
    }

    [Symbol.iterator](): Iterator<Rule> {
        return this.rules.values();
    }
}
