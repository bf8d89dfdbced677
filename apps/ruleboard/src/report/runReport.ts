/**
 * @fileoverview Run report
 *
 * Serializes a RunSummary for report.json. Timestamps become ISO
 * strings and destinations become paths relative to the output
 * directory, so the report can be published next to the rule files.
 *
 * @module report/runReport
 */

import { relative } from "path";
import type {
    AggregateStats,
    Dialect,
    Format,
    NormalizeStats,
    OverlapReport,
    RedirectEntry,
    RunSummary,
    SourceStatus,
} from "@ruleboard/engine";

export interface SourceReportJson {
    name: string;
    urls: string[];
    status: SourceStatus;
    format: Format | null;
    formatHinted: boolean;
    fetchedAt: string | null;
    rules: number;
    stats: NormalizeStats | null;
    skipRate: number;
    suspectedMisdetection: boolean;
    redirects: RedirectEntry[];
    error?: string;
}

export interface TargetReportJson {
    dialect: Dialect;
    path: string;
    success: boolean;
    written: number;
    omitted: number;
    bytes: number;
    error?: string;
}

/**
 * report.json document.
 */
export interface RunReportJson {
    runId: string;
    startedAt: string;
    finishedAt: string;
    succeeded: boolean;
    totalRules: number;
    skippedLines: number;
    aggregate: AggregateStats;
    sources: SourceReportJson[];
    overlap: OverlapReport;
    targets: TargetReportJson[];
}

/**
 * Convert a run summary into its report.json shape.
 *
 * @param outputDir - Directory that target paths are made relative to
 */
export function toRunReport(summary: RunSummary, outputDir: string): RunReportJson {
    return {
        runId       : summary.runId,
        startedAt   : summary.startedAt.toISOString(),
        finishedAt  : summary.finishedAt.toISOString(),
        succeeded   : summary.succeeded,
        totalRules  : summary.aggregate.unique,
        skippedLines: summary.skippedLines,
        aggregate   : summary.aggregate,
        sources     : summary.sources.map((source) => ({
            name                 : source.name,
            urls                 : [...source.urls],
            status               : source.status,
            format               : source.format,
            formatHinted         : source.formatHinted,
            fetchedAt            : source.fetchedAt ? source.fetchedAt.toISOString() : null,
            rules                : source.rules,
            stats                : source.stats,
            skipRate             : source.skipRate,
            suspectedMisdetection: source.suspectedMisdetection,
            redirects            : [...source.redirects],
            ...(source.error !== undefined ? { error: source.error } : {}),
        })),
        overlap: summary.overlap,
        targets: summary.targets.map((target) => ({
            dialect: target.dialect,
            path   : relative(outputDir, target.destination),
            success: target.success,
            written: target.written,
            omitted: target.omitted,
            bytes  : target.bytes,
            ...(target.error !== undefined ? { error: target.error } : {}),
        })),
    };
}

/**
 * Render the report as pretty-printed JSON with a trailing newline.
 */
export function renderRunReport(summary: RunSummary, outputDir: string): string {
    return JSON.stringify(toRunReport(summary, outputDir), null, 2) + "\n";
}
