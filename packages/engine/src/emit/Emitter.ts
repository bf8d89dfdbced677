/**
 * @fileoverview Emitter
 *
 * Renders a RuleSet into a target dialect and replaces the target file
 * atomically.
 *
 * @module @ruleboard/engine/emit/Emitter
 */

import type { EmitContext, EmitResult, EmissionTarget } from "../contracts/Emitter.js";
import type { Rule } from "../contracts/Rule.js";
import { WriteError, errorMessage } from "../contracts/errors.js";
import { DIALECT_RENDERERS } from "./dialects.js";
import { writeFileAtomic } from "./atomicWrite.js";

/**
 * A rendered file, before it is written.
 */
export interface RenderedTarget {
    readonly content: string;
    readonly written: number;
    readonly omitted: number;
}

/**
 * Render rules into the target's dialect without touching the filesystem.
 *
 * @throws Error if the dialect needs a template and it is missing or invalid
 */
export function render(rules: Iterable<Rule>, target: EmissionTarget, context: EmitContext): RenderedTarget {
    const renderer = DIALECT_RENDERERS[target.dialect];
    const lines: string[] = [];
    let omitted = 0;

    for (const rule of rules) {
        if (renderer.kinds.includes(rule.matchKind)) {
            lines.push(renderer.renderRule(rule, context));
        }
        else {
            omitted++;
        }
    }

    return {
        content: renderer.renderDocument(lines, context, target),
        written: lines.length,
        omitted,
    };
}

/**
 * Render and atomically write one target.
 *
 * @throws WriteError if rendering or writing fails; the previous file
 *         at the destination is left untouched
 *
 * @example
 * ```typescript
 * const result = await emit(ruleSet, {
 *     dialect: "loon-rules",
 *     destination: "/srv/rules/adblock_rules_only.list",
 * }, { title: "Aggregated ad blocking rules", tag: "AdBlock", sourceNames: ["hBlock"] });
 * ```
 */
export async function emit(
    rules: Iterable<Rule>,
    target: EmissionTarget,
    context: EmitContext
): Promise<EmitResult> {
    let rendered: RenderedTarget;
    try {
        rendered = render(rules, target, context);
    }
    catch (error) {
        throw new WriteError(errorMessage(error), target.destination, { cause: error });
    }

    const bytes = await writeFileAtomic(target.destination, rendered.content);

    return {
        dialect    : target.dialect,
        destination: target.destination,
        success    : true,
        written    : rendered.written,
        omitted    : rendered.omitted,
        bytes,
    };
}
