/**
 * @fileoverview Aggregator
 *
 * Merges per-source rule sequences into one RuleSet. Sources are
 * consumed in configured order; the first occurrence of a rule fixes
 * its position, so output order depends only on source order and not
 * on fetch completion order.
 *
 * @module @ruleboard/engine/aggregate/Aggregator
 */

import type { Rule } from "../contracts/Rule.js";
import { RuleSet } from "../impl/RuleSet.js";

/**
 * Aggregation options.
 */
export interface AggregateOptions {
    /**
     * Patterns never emitted, whatever their match kind. Compared
     * after lowercasing.
     */
    readonly exclude?: Iterable<string>;
}

/**
 * Aggregation counters.
 */
export interface AggregateStats {
    /** Rules offered across all sequences */
    readonly input: number;

    /** Rules in the resulting set */
    readonly unique: number;

    /** Rules dropped as duplicates of an earlier rule */
    readonly duplicates: number;

    /** Rules dropped by the exclusion list */
    readonly excluded: number;
}

/**
 * Result of aggregation.
 */
export interface AggregateResult {
    readonly ruleSet: RuleSet;
    readonly stats: AggregateStats;
}

/**
 * Merge rule sequences into a frozen, deduplicated RuleSet.
 *
 * @param sequences - Per-source rules, in configured source order
 *
 * @example
 * ```typescript
 * const { ruleSet, stats } = aggregate([adguardRules, hostsRules], { exclude: ["paypal.com"] });
 * ```
 */
export function aggregate(
    sequences: Iterable<Iterable<Rule>>,
    options: AggregateOptions = {}
): AggregateResult {
    const excluded = new Set<string>();
    for (const pattern of options.exclude ?? []) {
        excluded.add(pattern.trim().toLowerCase());
    }

    const ruleSet = new RuleSet();
    let input = 0;
    let duplicates = 0;
    let excludedCount = 0;

    for (const sequence of sequences) {
        for (const rule of sequence) {
            input++;

            if (excluded.has(rule.pattern)) {
                excludedCount++;
                continue;
            }

            if (!ruleSet.add(rule)) {
                duplicates++;
            }
        }
    }

    ruleSet.freeze();

    return {
        ruleSet,
        stats: {
            input,
            unique    : ruleSet.size,
            duplicates,
            excluded  : excludedCount,
        },
    };
}
