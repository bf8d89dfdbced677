/**
 * @fileoverview Report barrel exports
 *
 * @module report
 */

export {
    renderRunReport,
    toRunReport,
    type RunReportJson,
    type SourceReportJson,
    type TargetReportJson,
} from "./runReport.js";
export {
    escapeHtml,
    renderSourceRows,
    renderStatusPage,
    renderTargetRows,
} from "./statusPage.js";
export {
    writeReports,
    type WriteReportsOptions,
    type WrittenReports,
} from "./writeReports.js";
