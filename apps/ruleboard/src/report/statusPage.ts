/**
 * @fileoverview Status page
 *
 * Fills the status page template with one row per source and per
 * output file. Every interpolated value is HTML-escaped.
 *
 * @module report/statusPage
 */

import type { RunSummary, SourceStatus } from "@ruleboard/engine";
import { toRunReport } from "./runReport.js";

const HTML_ESCAPES: Readonly<Record<string, string>> = {
    "&" : "&amp;",
    "<" : "&lt;",
    ">" : "&gt;",
    "\"": "&quot;",
    "'" : "&#39;",
};

/**
 * Escape text for an HTML element body or a quoted attribute.
 */
export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const ROW_INDENT = " ".repeat(12);

function statusClass(status: SourceStatus): string {
    switch (status) {
        case "ok":
            return "status-ok";
        case "fetch-failed":
        case "unknown-format":
            return "status-failed";
        default:
            return "status-other";
    }
}

function formatRate(rate: number): string {
    return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Source table rows.
 */
export function renderSourceRows(summary: RunSummary): string {
    return summary.sources.map((source) => {
        const link = source.urls[0] ?? "";
        const cells = [
            `<td><a href="${escapeHtml(link)}">${escapeHtml(source.name)}</a></td>`,
            `<td class="${statusClass(source.status)}">${escapeHtml(source.status)}</td>`,
            `<td>${escapeHtml(source.format ?? "-")}</td>`,
            `<td>${source.rules}</td>`,
            `<td>${formatRate(source.skipRate)}</td>`,
            `<td>${source.fetchedAt ? escapeHtml(source.fetchedAt.toISOString()) : "-"}</td>`,
        ];
        return `${ROW_INDENT}<tr>${cells.join("")}</tr>`;
    }).join("\n");
}

/**
 * Output table rows, with paths relative to the output directory.
 */
export function renderTargetRows(summary: RunSummary, outputDir: string): string {
    return toRunReport(summary, outputDir).targets.map((target) => {
        const cells = [
            `<td><a href="${escapeHtml(target.path)}"><code>${escapeHtml(target.path)}</code></a></td>`,
            `<td>${escapeHtml(target.dialect)}</td>`,
            `<td>${target.written}</td>`,
            `<td>${target.omitted}</td>`,
            target.success
                ? `<td class="status-ok">written</td>`
                : `<td class="status-failed">${escapeHtml(target.error ?? "failed")}</td>`,
        ];
        return `${ROW_INDENT}<tr>${cells.join("")}</tr>`;
    }).join("\n");
}

/**
 * Fill the status page template.
 *
 * @example
 * ```typescript
 * const html = renderStatusPage(template, summary, { title: "Ad rules", outputDir: "public" });
 * ```
 */
export function renderStatusPage(
    template: string,
    summary: RunSummary,
    options: { title: string; outputDir: string }
): string {
    const values: Record<string, string> = {
        "{{TITLE}}"       : escapeHtml(options.title),
        "{{GENERATED_AT}}": escapeHtml(summary.finishedAt.toISOString()),
        "{{TOTAL_RULES}}" : String(summary.aggregate.unique),
        "{{SOURCE_ROWS}}" : renderSourceRows(summary),
        "{{TARGET_ROWS}}" : renderTargetRows(summary, options.outputDir),
    };

    let html = template;
    for (const [placeholder, value] of Object.entries(values)) {
        // Function replacer, so "$" in values is taken literally
        html = html.replaceAll(placeholder, () => value);
    }
    return html;
}
