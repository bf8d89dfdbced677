/**
 * @fileoverview Plain domain-list format handler
 *
 * One domain per line. A leading dot (the domain-set convention)
 * marks a suffix rule.
 *
 * @module @ruleboard/engine/formats/plain
 */

import type { FormatHandler, LineResult } from "../contracts/Format.js";
import { isCommentLine } from "../contracts/Format.js";
import { createRule, isValidDomain } from "../contracts/Rule.js";
import { stripInlineComment } from "./lines.js";

export const plainHandler: FormatHandler = {
    format: "PLAIN",

    matches(line: string): boolean {
        const domain = line.startsWith(".") ? line.slice(1) : line;
        return isValidDomain(domain.toLowerCase());
    },

    parseLine(line: string): LineResult {
        const trimmed = line.trim();
        if (!trimmed || isCommentLine(trimmed)) {
            return { kind: "ignored" };
        }

        const content = stripInlineComment(trimmed);
        if (/\s/.test(content)) {
            return { kind: "malformed" };
        }

        const rule = content.startsWith(".")
            ? createRule(content.slice(1), "SUFFIX")
            : createRule(content, "EXACT");

        return rule ? { kind: "rule", rules: [rule] } : { kind: "malformed" };
    },
};
