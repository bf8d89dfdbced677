/**
 * @fileoverview Surge / Loon rule-list format handler
 *
 * `TYPE,value[,policy][,options...]`. Only the domain rule types map to
 * canonical rules; trailing fields are ignored on input and regenerated
 * by the emitter.
 *
 * @module @ruleboard/engine/formats/surgeLoon
 */

import type { FormatHandler, LineResult } from "../contracts/Format.js";
import type { MatchKind } from "../contracts/Rule.js";
import { createRule } from "../contracts/Rule.js";

/**
 * Domain rule types and the match kind each maps to.
 */
export const DOMAIN_RULE_TYPES: Readonly<Record<string, MatchKind>> = {
    "DOMAIN"        : "EXACT",
    "DOMAIN-SUFFIX" : "SUFFIX",
    "DOMAIN-KEYWORD": "KEYWORD",
};

/**
 * Every rule type keyword recognized as Surge/Loon syntax.
 */
const RULE_TYPES: ReadonlySet<string> = new Set([
    ...Object.keys(DOMAIN_RULE_TYPES),
    "DOMAIN-SET",
    "DOMAIN-WILDCARD",
    "IP-CIDR",
    "IP-CIDR6",
    "IP-ASN",
    "GEOIP",
    "USER-AGENT",
    "URL-REGEX",
    "PROCESS-NAME",
    "DEST-PORT",
    "DST-PORT",
    "SRC-IP",
    "IN-PORT",
    "PROTOCOL",
    "RULE-SET",
    "AND",
    "OR",
    "NOT",
    "FINAL",
]);

function ruleType(line: string): string {
    const comma = line.indexOf(",");
    return (comma === -1 ? "" : line.slice(0, comma)).trim().toUpperCase();
}

export const surgeLoonHandler: FormatHandler = {
    format: "SURGE_LOON",

    matches(line: string): boolean {
        return RULE_TYPES.has(ruleType(line));
    },

    parseLine(line: string): LineResult {
        const content = line.trim();

        if (!content || content.startsWith("#") || content.startsWith(";") || content.startsWith("//")) {
            return { kind: "ignored" };
        }

        const type = ruleType(content);
        if (!RULE_TYPES.has(type)) {
            return { kind: "malformed" };
        }

        const matchKind = DOMAIN_RULE_TYPES[type];
        if (!matchKind) {
            return { kind: "unsupported" };
        }

        const [, value = ""] = content.split(",");
        const rule = createRule(value, matchKind);
        return rule ? { kind: "rule", rules: [rule] } : { kind: "malformed" };
    },
};
