/**
 * Loop compression: collapse recorded loop iterations into the first one.
 *
 * A LOOP header recorded true keeps its marker and its first iteration body
 * (compressed in turn, for nested loops). Everything after that, up to and
 * including the last false marker of the same header, is dropped. A header
 * recorded false means the loop was never entered and is kept alone.
 *
 * Loop identity is the condition hash. Nested loops that share a hash are
 * indistinguishable: the inner header ends the outer loop's first iteration.
 */
import type { ChainStep, ConditionChain } from "./chains.js";

export function isLoopStep(step: Pick<ChainStep, "kind">): boolean {
  return step.kind === "LOOP";
}

function isHeaderOf(step: ChainStep, hash: string): boolean {
  return isLoopStep(step) && step.condHash === hash;
}

function compressRange(steps: ConditionChain, start: number, end: number, out: ChainStep[]): void {
  let i = start;
  while (i < end) {
    const step = steps[i];
    if (!isLoopStep(step) || !step.value) {
      out.push(step);
      i++;
      continue;
    }

    out.push(step);
    const hash = step.condHash;

    // first iteration body runs to the next marker of this header
    let next = i + 1;
    while (next < end && !isHeaderOf(steps[next], hash)) next++;
    if (next > i + 1) {
      compressRange(steps, i + 1, next, out);
    }

    let lastExit = -1;
    for (let p = next; p < end; p++) {
      if (isHeaderOf(steps[p], hash) && !steps[p].value) lastExit = p;
    }
    i = lastExit >= 0 ? lastExit + 1 : next;
  }
}

/**
 * Idempotent: compressLoops(compressLoops(s)) equals compressLoops(s).
 *
 * One pass can leave the exit marker of an inner loop whose exit was recorded
 * after the enclosing loop's exit; passes repeat until nothing is dropped.
 * Each pass keeps a subsequence of its input, so an unchanged length means an
 * unchanged chain.
 */
export function compressLoops(steps: ConditionChain): ChainStep[] {
  let current: ChainStep[] = [...steps];
  while (current.length > 1) {
    const out: ChainStep[] = [];
    compressRange(current, 0, current.length, out);
    if (out.length === current.length) break;
    current = out;
  }
  return current;
}
