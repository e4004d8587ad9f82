/**
 * @condtrace/cli - CLI entry point re-exports
 */
export { runReport, buildReportOptions, formatStats } from "./cmd-report.js";
export type { ReportCmdOptions } from "./cmd-report.js";
export { runSummary, summarizeLog } from "./cmd-summary.js";
export type { EventLogSummary } from "./cmd-summary.js";
export { runMeta } from "./cmd-meta.js";
export type { MetaSummary } from "./cmd-meta.js";
