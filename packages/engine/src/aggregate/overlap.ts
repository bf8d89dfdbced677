/**
 * @fileoverview Source overlap analysis
 *
 * How much each source contributes on its own and how much it shares
 * with the others. Computed on rule identity (pattern + match kind).
 *
 * @module @ruleboard/engine/aggregate/overlap
 */

import type { Rule } from "../contracts/Rule.js";
import { ruleKey } from "../contracts/Rule.js";

/**
 * Rules of one source, before aggregation.
 */
export interface SourceRules {
    readonly name: string;
    readonly rules: Iterable<Rule>;
}

/**
 * Per-source contribution.
 */
export interface SourceOverlap {
    readonly name: string;

    /** Distinct rules in this source */
    readonly total: number;

    /** Rules found in no other source */
    readonly unique: number;

    /** Rules found in at least one other source */
    readonly overlapped: number;

    /** unique / total, as a percentage with two decimals */
    readonly uniquePct: number;

    /** overlapped / total, as a percentage with two decimals */
    readonly overlappedPct: number;
}

/**
 * Intersection of two sources.
 */
export interface PairOverlap {
    readonly a: string;
    readonly b: string;
    readonly sizeA: number;
    readonly sizeB: number;
    readonly overlap: number;
    readonly pctOfA: number;
    readonly pctOfB: number;
}

export interface OverlapReport {
    readonly sources: readonly SourceOverlap[];

    /** One entry per unordered pair, in configured order */
    readonly pairs: readonly PairOverlap[];
}

function percent(part: number, whole: number): number {
    return whole === 0 ? 0 : Math.round((part * 10000) / whole) / 100;
}

/**
 * Analyze overlap between sources.
 *
 * @example
 * ```typescript
 * const report = analyzeOverlap([
 *     { name: "hBlock", rules: hblockRules },
 *     { name: "AdGuard DNS filter", rules: adguardRules },
 * ]);
 * report.sources[0].unique; // rules only hBlock has
 * ```
 */
export function analyzeOverlap(perSource: readonly SourceRules[]): OverlapReport {
    const keySets = perSource.map((source) => {
        const keys = new Set<string>();
        for (const rule of source.rules) {
            keys.add(ruleKey(rule));
        }
        return keys;
    });

    // How many sources carry each key
    const occurrences = new Map<string, number>();
    for (const keys of keySets) {
        for (const key of keys) {
            occurrences.set(key, (occurrences.get(key) ?? 0) + 1);
        }
    }

    const sources: SourceOverlap[] = perSource.map((source, index) => {
        const keys = keySets[index];
        let unique = 0;
        for (const key of keys) {
            if (occurrences.get(key) === 1) {
                unique++;
            }
        }

        const total = keys.size;
        const overlapped = total - unique;

        return {
            name         : source.name,
            total,
            unique,
            overlapped,
            uniquePct    : percent(unique, total),
            overlappedPct: percent(overlapped, total),
        };
    });

    const pairs: PairOverlap[] = [];
    for (let i = 0; i < perSource.length; i++) {
        for (let j = i + 1; j < perSource.length; j++) {
            const [smaller, larger] = keySets[i].size <= keySets[j].size
                ? [keySets[i], keySets[j]]
                : [keySets[j], keySets[i]];

            let overlap = 0;
            for (const key of smaller) {
                if (larger.has(key)) {
                    overlap++;
                }
            }

            pairs.push({
                a     : perSource[i].name,
                b     : perSource[j].name,
                sizeA : keySets[i].size,
                sizeB : keySets[j].size,
                overlap,
                pctOfA: percent(overlap, keySets[i].size),
                pctOfB: percent(overlap, keySets[j].size),
            });
        }
    }

    return { sources, pairs };
}
