/**
 * Exact matcher: runtime chain vs. every static chain of the same function.
 */
import type { ConditionChain } from "./chains.js";
import type { StaticMeta, StaticChain } from "./meta.js";

export interface ExactMatch {
  source: string;
  chainId: number;
  condHashes: Array<[string, boolean]>;
}

function sameSequence(runtime: ConditionChain, chain: StaticChain): boolean {
  if (runtime.length !== chain.steps.length) return false;
  for (let i = 0; i < runtime.length; i++) {
    const r = runtime[i];
    const s = chain.steps[i];
    if (r.condHash !== s.condHash || r.effective !== s.value) return false;
  }
  return true;
}

/**
 * `compressed` must already be loop-compressed. Identical static chains
 * are all reported.
 */
export function matchExact(
  funcHash: string | undefined,
  compressed: ConditionChain,
  meta: StaticMeta
): ExactMatch[] {
  if (funcHash === undefined) return [];
  const chains = meta.chainsByFunc.get(funcHash) ?? [];
  const matches: ExactMatch[] = [];
  for (const chain of chains) {
    if (!sameSequence(compressed, chain)) continue;
    matches.push({
      source: chain.source,
      chainId: chain.chainId,
      condHashes: chain.steps.map((s): [string, boolean] => [s.condHash, s.value]),
    });
  }
  return matches;
}
