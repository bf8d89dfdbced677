/**
 * @fileoverview Hosts-file format handler
 *
 * `IP hostname [hostname...] [# comment]`. Loopback and unspecified
 * addresses are block markers; any other address is a redirect.
 *
 * @module @ruleboard/engine/formats/hosts
 */

import ipaddr from "ipaddr.js";
import type { FormatHandler, LineResult } from "../contracts/Format.js";
import type { Rule } from "../contracts/Rule.js";
import { createRule } from "../contracts/Rule.js";
import { stripInlineComment } from "./lines.js";

const DOTTED_QUAD = /^\d{1,3}(?:\.\d{1,3}){3}$/;

/**
 * Names from the standard hosts preamble. Lines mapping only these
 * are part of the system file, not the block list.
 */
const PREAMBLE_NAMES: ReadonlySet<string> = new Set([
    "localhost",
    "localhost.localdomain",
    "local",
    "broadcasthost",
]);

/**
 * Address ranges that mean "this host is blocked".
 */
const BLOCK_MARKER_RANGES: ReadonlySet<string> = new Set(["unspecified", "loopback"]);

/**
 * Check whether a token is an IPv4 dotted quad or an IPv6 address.
 */
export function isIpToken(token: string): boolean {
    if (DOTTED_QUAD.test(token)) {
        return ipaddr.IPv4.isValid(token);
    }
    return token.includes(":") && ipaddr.IPv6.isValid(token);
}

/**
 * Check whether an address is a block marker (0.0.0.0, 127.x, ::, ::1).
 * IPv4-mapped forms such as `::ffff:0.0.0.0` are judged by their IPv4 address.
 */
export function isBlockMarker(address: string): boolean {
    const parsed = ipaddr.process(address);
    return BLOCK_MARKER_RANGES.has(parsed.range());
}

function isPreambleName(name: string): boolean {
    return PREAMBLE_NAMES.has(name) || name.startsWith("ip6-") || isIpToken(name);
}

/**
 * Convert one hostname to a rule. `*.example.com` and `.example.com`
 * are the wildcard convention and become SUFFIX rules.
 */
function hostnameToRule(hostname: string): Rule | null {
    if (hostname.startsWith("*.")) {
        return createRule(hostname.slice(2), "SUFFIX");
    }
    if (hostname.startsWith(".")) {
        return createRule(hostname.slice(1), "SUFFIX");
    }
    return createRule(hostname, "EXACT");
}

export const hostsHandler: FormatHandler = {
    format: "HOSTS",

    matches(line: string): boolean {
        const [address, hostname] = stripInlineComment(line).split(/\s+/);
        return hostname !== undefined && isIpToken(address);
    },

    parseLine(line: string): LineResult {
        const content = stripInlineComment(line);
        if (!content) {
            return { kind: "ignored" };
        }

        const [address, ...hostnames] = content.split(/\s+/);
        if (hostnames.length === 0 || !isIpToken(address)) {
            return { kind: "malformed" };
        }

        const names = hostnames
            .map((name) => name.toLowerCase())
            .filter((name) => !isPreambleName(name));

        if (names.length === 0) {
            return { kind: "ignored" };
        }

        const rules: Rule[] = [];
        for (const name of names) {
            const rule = hostnameToRule(name);
            if (rule) {
                rules.push(rule);
            }
        }

        if (rules.length === 0) {
            return { kind: "malformed" };
        }

        const rejected = names.length - rules.length;
        const extra = rejected > 0 ? { rejected } : {};

        if (!isBlockMarker(address)) {
            return { kind: "redirect", target: address, rules, ...extra };
        }

        return { kind: "rule", rules, ...extra };
    },
};
