/**
 * Triple emitter: one output record per assertion window.
 */
import { collectChain, dedupeByHash, resolveFuncHash } from "./chains.js";
import type { ChainStep, ConditionChain } from "./chains.js";
import { compressLoops } from "./compress.js";
import { matchExact } from "./match.js";
import type { ExactMatch } from "./match.js";
import type { ApproxMatcher, ApproxMatch, ApproxOptions, DiffStep } from "./approx.js";
import type { CondEvent, Id } from "./events.js";
import type { StaticMeta } from "./meta.js";
import type { AssertionWindow, Invocation, TestSession } from "./partition.js";
import { idKey } from "./partition.js";

// --- wire shapes ---

export interface TestBlock {
  suite: string | null;
  name: string | null;
  full: string | null;
  file: string | null;
  line: number | null;
}

export interface AssertionBlock {
  assert_id: Id | null;
  macro: string | null;
  file: string | null;
  line: number | null;
  raw: string | null;
}

export interface SlimCall {
  invocation_id: Id;
  call_file: string | null;
  call_line: number | null;
  call_expr: string | null;
}

export interface SlimCond {
  file: string | null;
  line: number | null;
  cond_norm: string | null;
  cond_hash: string;
  cond_kind: string | null;
  val: 0 | 1;
  flip: 0 | 1;
}

export interface WireExactMatch {
  source: string;
  chain_id: number;
  cond_hashes: Array<[string, boolean]>;
}

export type WireDiffStep =
  | { op: "keep" | "flip" | "subst"; run_idx: number; st_idx: number }
  | { op: "del"; run_idx: number }
  | { op: "ins"; st_idx: number };

export interface WireApproxMatch {
  source: string;
  chain_id: number;
  score: number;
  lcp: number;
  lcs: number;
  diffs: WireDiffStep[];
}

export interface InvocationBlock {
  func_hash?: string;
  signature?: string;
  matched_static?: WireExactMatch[];
  approx_static?: WireApproxMatch[];
}

export interface TripleRecord {
  test: TestBlock;
  assertion: AssertionBlock;
  prefix: SlimCall[];
  oracle_calls: SlimCall[];
  cond_chains: Record<string, SlimCond[]>;
  invocations: Record<string, InvocationBlock>;
}

// --- analysis ---

export interface ApproxSetup {
  matcher: ApproxMatcher;
  options: ApproxOptions;
}

export interface EmitOptions {
  /** Show each condition hash once in cond_chains. Never affects matching. */
  dedupeConds: boolean;
  /** Present only when approximate matching is enabled. */
  approx?: ApproxSetup;
}

export interface InvocationAnalysis {
  /** Loop-compressed full chain, the only input to matching. */
  compressed: ChainStep[];
  display: ConditionChain;
  funcHash?: string;
  signature?: string;
  exact: ExactMatch[];
  approx: ApproxMatch[];
}

export function analyzeInvocation(
  conds: readonly CondEvent[],
  meta: StaticMeta,
  opts: EmitOptions
): InvocationAnalysis {
  const compressed = compressLoops(collectChain(conds));
  const display = opts.dedupeConds ? dedupeByHash(compressed) : compressed;
  const funcHash = resolveFuncHash(compressed);
  const signature = funcHash !== undefined ? meta.functionsByHash.get(funcHash)?.signature : undefined;
  const exact = matchExact(funcHash, compressed, meta);
  const approx =
    exact.length === 0 && opts.approx
      ? opts.approx.matcher.match(funcHash, compressed, opts.approx.options)
      : [];
  return { compressed, display, funcHash, signature, exact, approx };
}

// --- wire conversion ---

function slimCall(inv: Invocation): SlimCall {
  return {
    invocation_id: inv.invocationId,
    call_file: inv.callFile ?? null,
    call_line: inv.callLine ?? null,
    call_expr: inv.callExpr ?? null,
  };
}

export function slimCond(step: ChainStep): SlimCond {
  return {
    file: step.file ?? null,
    line: step.line ?? null,
    cond_norm: step.norm ?? null,
    cond_hash: step.condHash,
    cond_kind: step.kind ?? null,
    val: step.value ? 1 : 0,
    flip: step.flip ? 1 : 0,
  };
}

function wireDiff(d: DiffStep): WireDiffStep {
  switch (d.op) {
    case "del":
      return { op: d.op, run_idx: d.runIdx };
    case "ins":
      return { op: d.op, st_idx: d.stIdx };
    default:
      return { op: d.op, run_idx: d.runIdx, st_idx: d.stIdx };
  }
}

function invocationBlock(a: InvocationAnalysis): InvocationBlock {
  const block: InvocationBlock = {};
  if (a.funcHash !== undefined) {
    block.func_hash = a.funcHash;
    if (a.signature) block.signature = a.signature;
  }
  if (a.exact.length > 0) {
    block.matched_static = a.exact.map((m) => ({
      source: m.source,
      chain_id: m.chainId,
      cond_hashes: m.condHashes,
    }));
  } else if (a.approx.length > 0) {
    block.approx_static = a.approx.map((m) => ({
      source: m.source,
      chain_id: m.chainId,
      score: m.score,
      lcp: m.lcp,
      lcs: m.lcs,
      diffs: m.diffs.map(wireDiff),
    }));
  }
  return block;
}

/**
 * Build the record for one window. Windows without oracle calls still
 * produce a record, with an empty oracle_calls list.
 */
export function buildTriple(
  session: TestSession,
  window: AssertionWindow,
  meta: StaticMeta,
  opts: EmitOptions
): TripleRecord {
  const { info } = session;
  const { assertion } = window;
  const condChains: Record<string, SlimCond[]> = {};
  const invocations: Record<string, InvocationBlock> = {};

  for (const inv of [...window.prefix, ...window.oracle]) {
    const key = idKey(inv.invocationId);
    const analysis = analyzeInvocation(window.conds.get(key) ?? [], meta, opts);
    condChains[key] = analysis.display.map(slimCond);
    const block = invocationBlock(analysis);
    if (Object.keys(block).length > 0) invocations[key] = block;
  }

  return {
    test: {
      suite: info.suite ?? null,
      name: info.name ?? null,
      full: info.full ?? null,
      file: info.file ?? null,
      line: info.line ?? null,
    },
    assertion: {
      assert_id: assertion.assertId ?? null,
      macro: assertion.macro ?? null,
      file: assertion.file ?? null,
      line: assertion.line ?? null,
      raw: assertion.raw ?? null,
    },
    prefix: window.prefix.map(slimCall),
    oracle_calls: window.oracle.map(slimCall),
    cond_chains: condChains,
    invocations,
  };
}

export function serializeTriple(record: TripleRecord): string {
  return JSON.stringify(record);
}
