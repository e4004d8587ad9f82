/**
 * Report pipeline: events + static meta -> one triple per assertion window.
 */
import { ApproxMatcher, DEFAULT_APPROX_OPTIONS } from "./approx.js";
import type { ApproxOptions } from "./approx.js";
import type { Diagnostic } from "./diagnostics.js";
import { buildTriple } from "./emitter.js";
import type { EmitOptions, TripleRecord } from "./emitter.js";
import type { TraceEvent } from "./events.js";
import type { StaticMeta } from "./meta.js";
import { partitionSessions } from "./partition.js";
import type { PartitionOptions } from "./partition.js";

export interface ReportOptions extends PartitionOptions {
  dedupeConds?: boolean;
  approx?: Partial<ApproxOptions> & { enabled?: boolean };
}

export interface ReportStats {
  tests: number;
  triples: number;
  invocations: number;
  exactMatched: number;
  approxMatched: number;
  unattributedConds: number;
}

export interface ReportResult {
  triples: TripleRecord[];
  diagnostics: Diagnostic[];
  stats: ReportStats;
}

export function generateReport(
  events: readonly TraceEvent[],
  meta: StaticMeta,
  opts: ReportOptions = {}
): ReportResult {
  const { sessions, diagnostics } = partitionSessions(events, {
    suite: opts.suite,
    test: opts.test,
  });

  const emitOpts: EmitOptions = { dedupeConds: !!opts.dedupeConds };
  if (opts.approx?.enabled) {
    emitOpts.approx = {
      matcher: ApproxMatcher.fromMeta(meta),
      options: {
        topK: opts.approx.topK ?? DEFAULT_APPROX_OPTIONS.topK,
        threshold: opts.approx.threshold ?? DEFAULT_APPROX_OPTIONS.threshold,
        prefilterSize: opts.approx.prefilterSize ?? DEFAULT_APPROX_OPTIONS.prefilterSize,
      },
    };
  }

  const triples: TripleRecord[] = [];
  const stats: ReportStats = {
    tests: sessions.length,
    triples: 0,
    invocations: 0,
    exactMatched: 0,
    approxMatched: 0,
    unattributedConds: 0,
  };

  for (const session of sessions) {
    stats.unattributedConds += session.unattributed.length;
    for (const window of session.windows) {
      const triple = buildTriple(session, window, meta, emitOpts);
      triples.push(triple);
      stats.invocations += triple.prefix.length + triple.oracle_calls.length;
      for (const block of Object.values(triple.invocations)) {
        if (block.matched_static) stats.exactMatched++;
        if (block.approx_static) stats.approxMatched++;
      }
    }
  }
  stats.triples = triples.length;

  return { triples, diagnostics, stats };
}
