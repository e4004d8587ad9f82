/**
 * condtrace summary - event log summary command
 */
import { readEventLog, formatDiagnostic, formatDiagnostics, makeDiag, idKey, EVENT_KINDS, CondtraceError } from "@condtrace/core";
import type { EventLog, TraceEventKind } from "@condtrace/core";

export interface EventLogSummary {
  file: string;
  lines: number;
  events: number;
  skipped: number;
  tests: number;
  invocations: number;
  conds: number;
  unattributedConds: number;
  byKind: Record<TraceEventKind, number>;
}

function zeroCounts(): Record<TraceEventKind, number> {
  return {
    test_start: 0,
    test_end: 0,
    assertion: 0,
    assertion_begin: 0,
    assertion_end: 0,
    invocation_start: 0,
    invocation_end: 0,
    cond: 0,
  };
}

export function summarizeLog(file: string, log: EventLog): EventLogSummary {
  const byKind = zeroCounts();
  const tests = new Set<string>();
  let unattributedConds = 0;

  for (const ev of log.events) {
    byKind[ev.kind]++;
    if (ev.testId !== undefined) tests.add(idKey(ev.testId));
    if (ev.kind === "cond" && ev.invocationId === undefined) unattributedConds++;
  }

  return {
    file,
    lines: log.stats.lines,
    events: log.stats.events,
    skipped: log.stats.skipped,
    tests: tests.size,
    invocations: byKind.invocation_start,
    conds: byKind.cond,
    unattributedConds,
    byKind,
  };
}

export async function runSummary(file: string, opts: { json?: boolean }): Promise<number> {
  let log: EventLog;
  try {
    log = readEventLog(file);
  } catch (e) {
    if (e instanceof CondtraceError) {
      console.error(formatDiagnostic(makeDiag(e.code, e.message), !opts.json));
      return 4;
    }
    throw e;
  }

  const summary = summarizeLog(file, log);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    if (log.diagnostics.length > 0) console.error(formatDiagnostics(log.diagnostics, false));
    return 0;
  }

  console.log("Event Log Summary");
  console.log(`  File:               ${summary.file}`);
  console.log(`  Lines:              ${summary.lines}`);
  console.log(`  Events:             ${summary.events}`);
  console.log(`  Skipped lines:      ${summary.skipped}`);
  console.log(`  Tests:              ${summary.tests}`);
  console.log(`  Invocations:        ${summary.invocations}`);
  console.log(`  Cond events:        ${summary.conds}`);
  console.log(`  Unattributed conds: ${summary.unattributedConds}`);
  const kinds = EVENT_KINDS.filter((k) => summary.byKind[k] > 0);
  if (kinds.length > 0) {
    console.log("  Events by kind:");
    for (const k of kinds) console.log(`    ${k}: ${summary.byKind[k]}`);
  }
  if (log.diagnostics.length > 0) console.error(formatDiagnostics(log.diagnostics, true));
  return 0;
}
