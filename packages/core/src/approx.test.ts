/**
 * Tests for approximate static chain matching.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  ApproxMatcher,
  StaticIndex,
  alignWithDiffs,
  jaccard,
  kindWeight,
  lcpLength,
  lcsLength,
  semanticId,
} from "./approx.js";
import type { SidValue } from "./approx.js";
import { collectChain } from "./chains.js";
import type { CondEvent, CondKind } from "./events.js";
import type { StaticChain, StaticCondition, StaticMeta } from "./meta.js";

const A: SidValue = ["IF\ta > 0", true];
const B: SidValue = ["IF\tb", true];
const C: SidValue = ["IF\tc", true];

function meta(conditions: StaticCondition[], chains: StaticChain[]): StaticMeta {
  const byHash = new Map<string, StaticCondition>();
  for (const c of conditions) if (c.hash !== undefined) byHash.set(c.hash, c);
  const byFunc = new Map<string, StaticChain[]>();
  for (const c of chains) byFunc.set(c.funcHash, [...(byFunc.get(c.funcHash) ?? []), c]);
  return {
    conditionsById: new Map(),
    conditionsByHash: byHash,
    chainsByFunc: byFunc,
    functionsByHash: new Map(),
    versions: {},
  };
}

function chain(chainId: number, steps: Array<[string, boolean]>): StaticChain {
  return { funcHash: "f1", chainId, source: "chains.meta.json", steps: steps.map(([condHash, value]) => ({ condHash, value })) };
}

function run(steps: Array<[string, string, CondKind, boolean]>): CondEvent[] {
  return steps.map(([condHash, norm, condKind, val]) => ({
    kind: "cond",
    testId: 1,
    invocationId: 0,
    func: "f1",
    condHash,
    norm,
    condKind,
    val,
    flip: false,
  }));
}

const staticMeta = meta(
  [
    { hash: "sA", norm: "a > 0", kind: "IF" },
    { hash: "sB", norm: "b", kind: "IF" },
  ],
  [
    chain(0, [["sA", true], ["sB", true]]),
    chain(1, [["sA", true], ["sB", false]]),
    chain(2, [["sB", false]]),
  ]
);

// Runtime hashes differ from the static ones; only kind and norm line up.
const runtime = collectChain(run([["rA", "a > 0", "IF", true], ["rB", "b", "IF", true]]));

describe("sequence metrics", () => {
  it("builds path-insensitive semantic ids", () => {
    assert.equal(semanticId("loop", "i < n"), "LOOP\ti < n");
    assert.equal(semanticId(undefined, undefined), "\t");
  });

  it("weights loops above branches and switch arms below", () => {
    assert.equal(kindWeight("LOOP"), 2);
    assert.equal(kindWeight("CASE"), 0.5);
    assert.equal(kindWeight("DEFAULT"), 0.5);
    assert.equal(kindWeight("IF"), 1);
    assert.equal(kindWeight(undefined), 1);
  });

  it("measures common prefix and subsequence", () => {
    assert.equal(lcpLength([A, B, C], [A, B]), 2);
    assert.equal(lcpLength([A, B], [B, A]), 0);
    assert.equal(lcsLength([A, B, C], [A, C]), 2);
    assert.equal(lcsLength([A, [B[0], false]], [A, B]), 1);
  });

  it("computes Jaccard similarity of id sets", () => {
    assert.equal(jaccard(new Set(["a", "b"]), new Set(["b", "c"])), 1 / 3);
    assert.equal(jaccard(new Set(), new Set()), 0);
  });
});

describe("alignWithDiffs", () => {
  it("keeps identical sequences", () => {
    const { raw, diffs } = alignWithDiffs([A, B], ["IF", "IF"], [A, B], ["IF", "IF"]);
    assert.equal(raw, 4);
    assert.deepEqual(diffs, [
      { op: "keep", runIdx: 0, stIdx: 0 },
      { op: "keep", runIdx: 1, stIdx: 1 },
    ]);
  });

  it("reports a flipped branch", () => {
    const { raw, diffs } = alignWithDiffs([A], ["IF"], [[A[0], false]], ["IF"]);
    assert.equal(raw, -0.5);
    assert.deepEqual(diffs, [{ op: "flip", runIdx: 0, stIdx: 0 }]);
  });

  it("reports an extra runtime step as a deletion", () => {
    const { raw, diffs } = alignWithDiffs([A, B, C], ["IF", "IF", "IF"], [A, C], ["IF", "IF"]);
    assert.equal(raw, 3.25);
    assert.deepEqual(diffs, [
      { op: "keep", runIdx: 0, stIdx: 0 },
      { op: "del", runIdx: 1 },
      { op: "keep", runIdx: 2, stIdx: 1 },
    ]);
  });

  it("reports missing runtime steps as insertions", () => {
    const { diffs } = alignWithDiffs([], [], [A], ["IF"]);
    assert.deepEqual(diffs, [{ op: "ins", stIdx: 0 }]);
  });
});

describe("StaticIndex", () => {
  it("leaves out chains with conditions lacking norm or kind", () => {
    const index = StaticIndex.fromMeta(
      meta([{ hash: "sA", norm: "a > 0", kind: "IF" }], [chain(0, [["sA", true]]), chain(1, [["unknown", true]])])
    );
    assert.deepEqual(index.byFunc.get("f1")?.map((c) => c.chainId), [0]);
  });
});

describe("ApproxMatcher", () => {
  const matcher = ApproxMatcher.fromMeta(staticMeta);

  it("keeps only candidates at or above the threshold", () => {
    const out = matcher.match("f1", runtime);
    assert.deepEqual(out.map((m) => [m.chainId, m.score]), [[0, 1]]);
    assert.equal(out[0].lcp, 2);
    assert.equal(out[0].lcs, 2);
  });

  it("orders candidates by descending score", () => {
    const out = matcher.match("f1", runtime, { threshold: 0 });
    assert.deepEqual(out.map((m) => [m.chainId, m.score]), [[0, 1], [1, 0.4125], [2, 0]]);
    assert.deepEqual(out[1].diffs, [
      { op: "keep", runIdx: 0, stIdx: 0 },
      { op: "flip", runIdx: 1, stIdx: 1 },
    ]);
  });

  it("keeps scores within [0, 1]", () => {
    for (const m of matcher.match("f1", runtime, { threshold: 0 })) {
      assert.ok(m.score >= 0 && m.score <= 1);
    }
  });

  it("returns at most topK candidates", () => {
    assert.deepEqual(matcher.match("f1", runtime, { threshold: 0, topK: 2 }).map((m) => m.chainId), [0, 1]);
  });

  it("scores only the prefiltered candidates", () => {
    assert.deepEqual(matcher.match("f1", runtime, { threshold: 0, prefilterSize: 1 }).map((m) => m.chainId), [0]);
  });

  it("has no candidates without a function hash", () => {
    assert.deepEqual(matcher.match(undefined, runtime, { threshold: 0 }), []);
    assert.deepEqual(matcher.match("f9", runtime, { threshold: 0 }), []);
  });
});
