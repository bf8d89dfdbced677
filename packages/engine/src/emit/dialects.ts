/**
 * @fileoverview Dialect renderers
 *
 * One renderer per output dialect. Rule files start with `#` header
 * lines (title, rule count, sources) and carry no timestamp, so a run
 * over identical inputs reproduces identical bytes.
 *
 * @module @ruleboard/engine/emit/dialects
 */

import { stringify as stringifyYaml } from "yaml";
import type { Dialect, DialectRenderer, EmitContext, EmissionTarget } from "../contracts/Emitter.js";
import type { MatchKind, Rule } from "../contracts/Rule.js";
import { MATCH_KINDS } from "../contracts/Rule.js";

/** Line in a loon-config template replaced by the rules block */
export const RULES_PLACEHOLDER = "{{RULES}}";

export const RULES_BEGIN_MARKER = "# >>> ruleboard:rules >>>";
export const RULES_END_MARKER = "# <<< ruleboard:rules <<<";

/**
 * Surge/Loon rule type keyword for each match kind.
 */
export const LOON_RULE_TYPE: Readonly<Record<MatchKind, string>> = {
    EXACT  : "DOMAIN",
    SUFFIX : "DOMAIN-SUFFIX",
    KEYWORD: "DOMAIN-KEYWORD",
};

function header(context: EmitContext, count: number): string[] {
    const lines = [
        `# ${context.title}`,
        `# Rules: ${count}`,
    ];
    if (context.sourceNames.length > 0) {
        lines.push(`# Sources: ${context.sourceNames.join(", ")}`);
    }
    return lines;
}

/**
 * Join a header and body. The blank separator line only precedes a
 * non-empty body, so the file always ends in a single newline.
 */
function joinDocument(head: readonly string[], lines: readonly string[]): string {
    const body = lines.length > 0 ? ["", ...lines] : [];
    return [...head, ...body].join("\n") + "\n";
}

function withHeader(lines: readonly string[], context: EmitContext): string {
    return joinDocument(header(context, lines.length), lines);
}

function loonRule(rule: Rule): string {
    return `${LOON_RULE_TYPE[rule.matchKind]},${rule.pattern}`;
}

/**
 * Substitute the rules block into a template. The placeholder must sit
 * on its own line; everything else is copied verbatim.
 *
 * @throws Error if the template is missing or has no placeholder line
 */
export function renderTemplate(template: string | undefined, lines: readonly string[]): string {
    if (template === undefined) {
        throw new Error("loon-config target requires a template");
    }

    const templateLines = template.split(/\r?\n/);
    const index = templateLines.findIndex((line) => line.trim() === RULES_PLACEHOLDER);
    if (index === -1) {
        throw new Error(`Template has no ${RULES_PLACEHOLDER} line`);
    }

    const output = [
        ...templateLines.slice(0, index),
        RULES_BEGIN_MARKER,
        ...lines,
        RULES_END_MARKER,
        ...templateLines.slice(index + 1),
    ];

    // Exactly one trailing newline
    while (output.length > 0 && output[output.length - 1] === "") {
        output.pop();
    }
    return output.join("\n") + "\n";
}

const loonListRenderer: DialectRenderer = {
    dialect       : "loon-list",
    kinds         : MATCH_KINDS,
    renderRule    : (rule) => loonRule(rule),
    renderDocument: (lines, context) => withHeader(lines, context),
};

const loonRulesRenderer: DialectRenderer = {
    dialect       : "loon-rules",
    kinds         : MATCH_KINDS,
    renderRule    : (rule) => `${loonRule(rule)},${rule.action}`,
    renderDocument: (lines, context) => withHeader(lines, context),
};

const loonConfigRenderer: DialectRenderer = {
    dialect       : "loon-config",
    kinds         : MATCH_KINDS,
    renderRule    : (rule, context) => `${loonRule(rule)},policy=${rule.action},tag=${context.tag},enabled=true`,
    renderDocument: (lines, _context, target: EmissionTarget) => renderTemplate(target.template, lines),
};

const clashProviderRenderer: DialectRenderer = {
    dialect   : "clash-provider",
    kinds     : ["EXACT", "SUFFIX"],
    renderRule: (rule) => (rule.matchKind === "SUFFIX" ? `+.${rule.pattern}` : rule.pattern),
    renderDocument(lines, context) {
        const head = [...header(context, lines.length), "# behavior: domain"].join("\n");
        return `${head}\n${stringifyYaml({ payload: [...lines] })}`;
    },
};

const domainsRenderer: DialectRenderer = {
    dialect       : "domains",
    kinds         : ["EXACT", "SUFFIX"],
    renderRule    : (rule) => (rule.matchKind === "SUFFIX" ? `.${rule.pattern}` : rule.pattern),
    renderDocument: (lines, context) => withHeader(lines, context),
};

const hostsRenderer: DialectRenderer = {
    dialect       : "hosts",
    kinds         : ["EXACT"],
    renderRule    : (rule) => `0.0.0.0 ${rule.pattern}`,
    renderDocument: (lines, context) => withHeader(lines, context),
};

const adblockRenderer: DialectRenderer = {
    dialect   : "adblock",
    kinds     : ["SUFFIX"],
    renderRule: (rule) => `||${rule.pattern}^`,
    renderDocument(lines, context) {
        // Adblock comments use "!" rather than "#"
        const head = header(context, lines.length).map((line) => `!${line.slice(1)}`);
        return joinDocument(["[Adblock Plus 2.0]", ...head], lines);
    },
};

/**
 * Renderer registry. A Record over Dialect, so every dialect must have one.
 */
export const DIALECT_RENDERERS: Readonly<Record<Dialect, DialectRenderer>> = {
    "loon-list"     : loonListRenderer,
    "loon-rules"    : loonRulesRenderer,
    "loon-config"   : loonConfigRenderer,
    "clash-provider": clashProviderRenderer,
    "domains"       : domainsRenderer,
    "hosts"         : hostsRenderer,
    "adblock"       : adblockRenderer,
};
