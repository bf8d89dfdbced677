/**
 * @fileoverview Report writer
 *
 * Writes report.json and the status page with the same atomic
 * replacement the rule files use. Failures are logged and never change
 * the run outcome.
 *
 * @module report/writeReports
 */

import { readFile } from "fs/promises";
import { errorMessage, writeFileAtomic, type EngineLogger, type RunSummary } from "@ruleboard/engine";
import type { ReportConfig } from "../config/index.js";
import { resolvePath } from "../config/index.js";
import { renderRunReport } from "./runReport.js";
import { renderStatusPage } from "./statusPage.js";

export interface WriteReportsOptions {
    readonly outputDir: string;
    readonly report: ReportConfig;
    readonly title: string;

    /** Template used when the configuration names none */
    readonly defaultTemplate: string;

    readonly logger: EngineLogger;
}

/**
 * Paths written, for logging.
 */
export interface WrittenReports {
    readonly json: string | null;
    readonly page: string | null;
}

export async function writeReports(summary: RunSummary, options: WriteReportsOptions): Promise<WrittenReports> {
    const { outputDir, report, logger } = options;
    let json: string | null = null;
    let page: string | null = null;

    if (report.json !== null) {
        const destination = resolvePath(outputDir, report.json);
        try {
            await writeFileAtomic(destination, renderRunReport(summary, outputDir));
            json = destination;
        }
        catch (error) {
            logger.error("Failed to write run report", { destination, error: errorMessage(error) });
        }
    }

    if (report.page !== null) {
        const destination = resolvePath(outputDir, report.page);
        const templatePath = report.template ?? options.defaultTemplate;
        try {
            const template = await readFile(templatePath, "utf-8");
            const html = renderStatusPage(template, summary, { title: options.title, outputDir });
            await writeFileAtomic(destination, html);
            page = destination;
        }
        catch (error) {
            logger.error("Failed to write status page", { destination, template: templatePath, error: errorMessage(error) });
        }
    }

    return { json, page };
}
