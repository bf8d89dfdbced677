/**
 * @fileoverview Adblock format handler
 *
 * Only domain-anchored blocking rules (`||example.com^`, with optional
 * `$modifiers`) carry over. Exceptions and element hiding are dropped;
 * URL, path and regex rules have no domain-level equivalent.
 *
 * @module @ruleboard/engine/formats/adblock
 */

import type { FormatHandler, LineResult } from "../contracts/Format.js";
import { createRule } from "../contracts/Rule.js";

/** `||domain^` with optional `$modifiers`; modifiers are ignored */
const DOMAIN_ANCHOR = /^\|\|([^\^/$|*]+)\^(?:\$.*)?$/;

/** Element hiding and scriptlet separators: ##, #@#, #?#, #$#, #@?#, #%# ... */
const COSMETIC_SEPARATOR = /#[@?$%]{0,2}#/;

export const adblockHandler: FormatHandler = {
    format: "ADBLOCK",

    matches(line: string): boolean {
        return line.startsWith("||") || line.startsWith("@@") || COSMETIC_SEPARATOR.test(line);
    },

    parseLine(line: string): LineResult {
        const content = line.trim();

        if (!content || content.startsWith("!") || content.startsWith("[") || content.startsWith("#")) {
            return { kind: "ignored" };
        }

        // Exception rules re-allow traffic; this collector only gathers blocks
        if (content.startsWith("@@") || COSMETIC_SEPARATOR.test(content)) {
            return { kind: "ignored" };
        }

        const match = DOMAIN_ANCHOR.exec(content);
        if (!match) {
            return { kind: "malformed" };
        }

        const rule = createRule(match[1], "SUFFIX");
        return rule ? { kind: "rule", rules: [rule] } : { kind: "malformed" };
    },
};
