/**
 * condtrace report - one JSONL triple per assertion
 */
import * as fs from "node:fs";
import {
  readEventLog,
  loadMeta,
  emptyMeta,
  generateReport,
  resolveConfig,
  serializeTriple,
  formatDiagnostic,
  formatDiagnostics,
  makeDiag,
  CondtraceError,
} from "@condtrace/core";
import type { Config, Diagnostic, EventLog, ReportOptions, ReportStats, StaticMeta } from "@condtrace/core";

export interface ReportCmdOptions {
  logs?: string;
  meta?: string;
  out?: string;
  dedupeConds?: boolean;
  approxMatch?: boolean;
  approxTopk?: string;
  approxThreshold?: string;
  approxPrefilter?: string;
  suite?: string;
  test?: string;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseCount(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new CliUsageError(`${flag} expects a positive integer, got '${raw}'`);
  }
  return n;
}

function parseThreshold(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new CliUsageError(`--approx-threshold expects a number between 0 and 1, got '${raw}'`);
  }
  return n;
}

/** Command-line flags override the resolved config. */
export function buildReportOptions(opts: ReportCmdOptions, config: Config): ReportOptions {
  return {
    suite: opts.suite,
    test: opts.test,
    dedupeConds: !!opts.dedupeConds || config.dedupeConds,
    approx: {
      enabled: !!opts.approxMatch || config.approx.enabled,
      topK: parseCount("--approx-topk", opts.approxTopk) ?? config.approx.topK,
      threshold: parseThreshold(opts.approxThreshold) ?? config.approx.threshold,
      prefilterSize: parseCount("--approx-prefilter", opts.approxPrefilter) ?? config.approx.prefilterSize,
    },
  };
}

export function formatStats(stats: ReportStats, skippedLines: number): string {
  return (
    `report: ${stats.tests} tests, ${stats.triples} triples, ${stats.invocations} invocations, ` +
    `${stats.exactMatched} exact, ${stats.approxMatched} approx, ` +
    `${stats.unattributedConds} unattributed conds, ${skippedLines} skipped lines`
  );
}

export async function runReport(opts: ReportCmdOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic(makeDiag(code, message), pretty));
  };

  if (!opts.logs) {
    emitCliError("E_USAGE", "Missing required option --logs <path>");
    return 2;
  }

  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  let reportOpts: ReportOptions;
  try {
    reportOpts = buildReportOptions(opts, resolved.config);
  } catch (e) {
    if (e instanceof CliUsageError) {
      emitCliError("E_USAGE", e.message);
      return 2;
    }
    throw e;
  }

  let log: EventLog;
  try {
    log = readEventLog(opts.logs);
  } catch (e) {
    if (e instanceof CondtraceError) {
      emitCliError(e.code, e.message);
      return 4;
    }
    throw e;
  }

  const diagnostics: Diagnostic[] = [...resolved.diagnostics, ...log.diagnostics];
  let meta: StaticMeta = emptyMeta();
  if (opts.meta) {
    const loaded = loadMeta(opts.meta);
    meta = loaded.meta;
    diagnostics.push(...loaded.diagnostics);
  }

  const result = generateReport(log.events, meta, reportOpts);
  diagnostics.push(...result.diagnostics);
  const lines = result.triples.map(serializeTriple);

  const out = opts.out ?? "-";
  if (out === "-") {
    for (const line of lines) console.log(line);
  } else {
    try {
      fs.writeFileSync(out, lines.map((l) => `${l}\n`).join(""), "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error writing output file: ${msg}`);
      return 4;
    }
  }

  if (diagnostics.length > 0) {
    console.error(formatDiagnostics(diagnostics, pretty));
  }
  console.error(formatStats(result.stats, log.stats.skipped));
  return 0;
}
