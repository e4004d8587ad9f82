/**
 * Approximate static chain matching.
 *
 * Used only when exact matching finds nothing for an invocation. Candidates
 * are the static chains of the same function; no function hash means no
 * candidates.
 *
 * Elements are compared by a path-insensitive semantic id, `KIND\tnorm`,
 * because condition hashes can differ for the same condition depending on
 * how the analyzer spelled or located it.
 */
import type { ChainStep, ConditionChain } from "./chains.js";
import type { StaticMeta } from "./meta.js";

export type SidValue = readonly [sid: string, value: boolean];

export type DiffStep =
  | { op: "keep"; runIdx: number; stIdx: number }
  | { op: "flip"; runIdx: number; stIdx: number }
  | { op: "subst"; runIdx: number; stIdx: number }
  | { op: "del"; runIdx: number }
  | { op: "ins"; stIdx: number };

export interface ApproxMatch {
  source: string;
  chainId: number;
  score: number;
  lcp: number;
  lcs: number;
  diffs: DiffStep[];
}

export interface ApproxOptions {
  topK: number;
  threshold: number;
  prefilterSize: number;
}

export const DEFAULT_APPROX_OPTIONS: ApproxOptions = {
  topK: 3,
  threshold: 0.6,
  prefilterSize: 20,
};

export function semanticId(kind: string | undefined, norm: string | undefined): string {
  return `${(kind ?? "").toUpperCase()}\t${norm ?? ""}`;
}

export function kindWeight(kind: string | undefined): number {
  switch ((kind ?? "").toUpperCase()) {
    case "LOOP":
      return 2.0;
    case "CASE":
    case "DEFAULT":
      return 0.5;
    default:
      return 1.0;
  }
}

// --- static index ---

export interface IndexedChain {
  chainId: number;
  source: string;
  sidValues: SidValue[];
  kinds: string[];
  sidSet: Set<string>;
  weightSum: number;
}

export class StaticIndex {
  readonly byFunc: ReadonlyMap<string, readonly IndexedChain[]>;

  private constructor(byFunc: Map<string, IndexedChain[]>) {
    this.byFunc = byFunc;
  }

  /**
   * Chains that reference a condition without a known norm and kind are left
   * out; the remaining chains keep their chain ids.
   */
  static fromMeta(meta: StaticMeta): StaticIndex {
    const byFunc = new Map<string, IndexedChain[]>();
    for (const [funcHash, chains] of meta.chainsByFunc) {
      const out: IndexedChain[] = [];
      for (const chain of chains) {
        const sidValues: SidValue[] = [];
        const kinds: string[] = [];
        let complete = true;
        for (const step of chain.steps) {
          const cond = meta.conditionsByHash.get(step.condHash);
          if (cond?.norm === undefined || cond.kind === undefined) {
            complete = false;
            break;
          }
          sidValues.push([semanticId(cond.kind, cond.norm), step.value]);
          kinds.push(cond.kind);
        }
        if (!complete) continue;
        out.push({
          chainId: chain.chainId,
          source: chain.source,
          sidValues,
          kinds,
          sidSet: new Set(sidValues.map(([sid]) => sid)),
          weightSum: kinds.reduce((sum, k) => sum + kindWeight(k), 0),
        });
      }
      if (out.length > 0) byFunc.set(funcHash, out);
    }
    return new StaticIndex(byFunc);
  }
}

// --- sequence metrics ---

function sameElement(a: SidValue, b: SidValue): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function lcpLength(a: readonly SidValue[], b: readonly SidValue[]): number {
  const n = Math.min(a.length, b.length);
  let i = 0;
  while (i < n && sameElement(a[i], b[i])) i++;
  return i;
}

export function lcsLength(a: readonly SidValue[], b: readonly SidValue[]): number {
  const m = b.length;
  let next = new Array<number>(m + 1).fill(0);
  for (let i = a.length - 1; i >= 0; i--) {
    const row = new Array<number>(m + 1).fill(0);
    for (let j = m - 1; j >= 0; j--) {
      row[j] = sameElement(a[i], b[j]) ? 1 + next[j + 1] : Math.max(next[j], row[j + 1]);
    }
    next = row;
  }
  return next[0];
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let inter = 0;
  for (const x of a) if (b.has(x)) inter++;
  const union = a.size + b.size - inter;
  return union === 0 ? 0 : inter / union;
}

// --- alignment ---

const KEEP = 2.0;
const FLIP = -0.5;
const SUBST = -1.0;
const GAP = -0.75;

type Move = "match" | "del" | "ins";

export interface Alignment {
  raw: number;
  diffs: DiffStep[];
}

/**
 * Weighted global alignment of a runtime sequence against a static one.
 * Each cell weight is the mean kind weight of the two elements, so a loop
 * header out of place costs more than a flipped branch.
 */
export function alignWithDiffs(
  run: readonly SidValue[],
  runKinds: readonly string[],
  st: readonly SidValue[],
  stKinds: readonly string[]
): Alignment {
  const n = run.length;
  const m = st.length;
  const score: number[][] = [];
  const moves: Array<Array<Move | null>> = [];
  for (let i = 0; i <= n; i++) {
    score.push(new Array<number>(m + 1).fill(0));
    moves.push(new Array<Move | null>(m + 1).fill(null));
  }

  const gapRun = (i: number): number => GAP * kindWeight(runKinds[i - 1]);
  const gapSt = (j: number): number => GAP * kindWeight(stKinds[j - 1]);

  for (let i = 1; i <= n; i++) {
    score[i][0] = score[i - 1][0] + gapRun(i);
    moves[i][0] = "del";
  }
  for (let j = 1; j <= m; j++) {
    score[0][j] = score[0][j - 1] + gapSt(j);
    moves[0][j] = "ins";
  }

  for (let i = 1; i <= n; i++) {
    const [sidI, valI] = run[i - 1];
    for (let j = 1; j <= m; j++) {
      const [sidJ, valJ] = st[j - 1];
      const w = 0.5 * (kindWeight(runKinds[i - 1]) + kindWeight(stKinds[j - 1]));
      const s = sidI === sidJ ? (valI === valJ ? KEEP * w : FLIP * w) : SUBST * w;
      const cMatch = score[i - 1][j - 1] + s;
      const cDel = score[i - 1][j] + gapRun(i);
      const cIns = score[i][j - 1] + gapSt(j);
      if (cMatch >= cDel && cMatch >= cIns) {
        score[i][j] = cMatch;
        moves[i][j] = "match";
      } else if (cDel >= cIns) {
        score[i][j] = cDel;
        moves[i][j] = "del";
      } else {
        score[i][j] = cIns;
        moves[i][j] = "ins";
      }
    }
  }

  const diffs: DiffStep[] = [];
  let i = n;
  let j = m;
  while (i > 0 || j > 0) {
    const move = moves[i][j];
    if (move === null) break;
    if (move === "match") {
      const [sidI, valI] = run[i - 1];
      const [sidJ, valJ] = st[j - 1];
      const op = sidI !== sidJ ? "subst" : valI === valJ ? "keep" : "flip";
      diffs.push({ op, runIdx: i - 1, stIdx: j - 1 });
      i--;
      j--;
    } else if (move === "del") {
      diffs.push({ op: "del", runIdx: i - 1 });
      i--;
    } else {
      diffs.push({ op: "ins", stIdx: j - 1 });
      j--;
    }
  }
  diffs.reverse();
  return { raw: score[n][m], diffs };
}

function round4(x: number): number {
  return Math.round(x * 10000) / 10000;
}

// --- matcher ---

export class ApproxMatcher {
  constructor(private readonly index: StaticIndex) {}

  static fromMeta(meta: StaticMeta): ApproxMatcher {
    return new ApproxMatcher(StaticIndex.fromMeta(meta));
  }

  private prefilter(runSids: Set<string>, candidates: readonly IndexedChain[], size: number): IndexedChain[] {
    return candidates
      .map((chain) => ({ chain, sim: jaccard(runSids, chain.sidSet) }))
      .sort((a, b) => b.sim - a.sim)
      .slice(0, size)
      .map((c) => c.chain);
  }

  /**
   * `compressed` must already be loop-compressed. Results are sorted by
   * descending score; equal scores keep prefilter order.
   */
  match(
    funcHash: string | undefined,
    compressed: ConditionChain,
    opts: Partial<ApproxOptions> = {}
  ): ApproxMatch[] {
    const { topK, threshold, prefilterSize } = { ...DEFAULT_APPROX_OPTIONS, ...opts };
    if (funcHash === undefined) return [];
    const all = this.index.byFunc.get(funcHash);
    if (!all || all.length === 0) return [];

    const run = compressed.map((s: ChainStep): SidValue => [semanticId(s.kind, s.norm), s.effective]);
    const runKinds = compressed.map((s) => s.kind ?? "");
    const runSids = new Set(run.map(([sid]) => sid));
    const runWeight = runKinds.reduce((sum, k) => sum + kindWeight(k), 0);

    const candidates = this.prefilter(runSids, all, prefilterSize);
    const scored: Array<{ exact: number; match: ApproxMatch }> = [];
    for (const chain of candidates) {
      const { raw, diffs } = alignWithDiffs(run, runKinds, chain.sidValues, chain.kinds);
      const maxPossible = Math.max(1e-6, 2.0 * Math.min(runWeight, chain.weightSum));
      const norm = Math.max(0, Math.min(1, raw / maxPossible));
      const lcp = lcpLength(run, chain.sidValues);
      const lcs = lcsLength(run, chain.sidValues);
      const lmin = Math.max(1, Math.min(run.length, chain.sidValues.length));
      const score = 0.7 * norm + 0.2 * (lcp / lmin) + 0.1 * (lcs / lmin);
      if (score < threshold) continue;
      scored.push({
        exact: score,
        match: { source: chain.source, chainId: chain.chainId, score: round4(score), lcp, lcs, diffs },
      });
    }
    scored.sort((a, b) => b.exact - a.exact);
    return scored.slice(0, Math.max(0, topK)).map((s) => s.match);
  }
}
