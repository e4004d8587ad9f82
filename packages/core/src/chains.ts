/**
 * Condition chain aggregation for one invocation.
 */
import type { CondEvent, CondKind } from "./events.js";

export interface ChainStep {
  condHash: string;
  /** Raw recorded value; loop entry/exit is decided on this. */
  value: boolean;
  /** value XOR polarity flip; the value matched against static chains. */
  effective: boolean;
  flip: boolean;
  kind?: CondKind;
  norm?: string;
  file?: string;
  line?: number;
  func?: string;
}

export type ConditionChain = readonly ChainStep[];

export function effectiveValue(ev: Pick<CondEvent, "val" | "flip">): boolean {
  return ev.val !== ev.flip;
}

export function toChainStep(ev: CondEvent): ChainStep {
  return {
    condHash: ev.condHash,
    value: ev.val,
    effective: effectiveValue(ev),
    flip: ev.flip,
    kind: ev.condKind,
    norm: ev.norm,
    file: ev.file,
    line: ev.line,
    func: ev.func,
  };
}

/**
 * Full matching sequence, in arrival order.
 */
export function collectChain(conds: readonly CondEvent[]): ConditionChain {
  return conds.map(toChainStep);
}

/**
 * Display form: first occurrence of each condition hash.
 */
export function dedupeByHash(steps: ConditionChain): ConditionChain {
  const seen = new Set<string>();
  const out: ChainStep[] = [];
  for (const step of steps) {
    if (seen.has(step.condHash)) continue;
    seen.add(step.condHash);
    out.push(step);
  }
  return out;
}

export function resolveFuncHash(steps: ConditionChain): string | undefined {
  for (const step of steps) {
    if (step.func) return step.func;
  }
  return undefined;
}
