/**
 * Tests for triple emission.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { analyzeInvocation, buildTriple, serializeTriple } from "./emitter.js";
import { ApproxMatcher } from "./approx.js";
import type { CondEvent, CondKind } from "./events.js";
import type { StaticChain, StaticCondition, StaticMeta } from "./meta.js";
import type { AssertionWindow, TestSession } from "./partition.js";

function cond(condHash: string, val: boolean, condKind: CondKind, norm = condHash): CondEvent {
  return { kind: "cond", testId: 1, invocationId: 0, func: "f1", condHash, norm, condKind, val, flip: false, file: "m.cc", line: 4 };
}

function staticMeta(conditions: StaticCondition[], chains: Array<Array<[string, boolean]>>): StaticMeta {
  const byHash = new Map<string, StaticCondition>();
  for (const c of conditions) if (c.hash !== undefined) byHash.set(c.hash, c);
  const list: StaticChain[] = chains.map((steps, chainId) => ({
    funcHash: "f1",
    chainId,
    source: "chains.meta.json",
    steps: steps.map(([condHash, value]) => ({ condHash, value })),
  }));
  return {
    conditionsById: new Map(),
    conditionsByHash: byHash,
    chainsByFunc: new Map([["f1", list]]),
    functionsByHash: new Map([["f1", { hash: "f1", signature: "bool check(int)" }]]),
    versions: {},
  };
}

const repeated = [cond("h2", true, "IF"), cond("h3", false, "IF"), cond("h2", false, "IF")];

describe("analyzeInvocation", () => {
  it("dedupes the displayed chain without affecting matching", () => {
    const meta = staticMeta([], [[["h2", true], ["h3", false], ["h2", false]]]);
    const a = analyzeInvocation(repeated, meta, { dedupeConds: true });
    assert.deepEqual(a.display.map((s) => s.condHash), ["h2", "h3"]);
    assert.equal(a.compressed.length, 3);
    assert.deepEqual(a.exact.map((m) => m.chainId), [0]);
    assert.equal(a.signature, "bool check(int)");
  });

  it("skips approximate matching when an exact match exists", () => {
    const meta = staticMeta(
      [
        { hash: "h2", norm: "h2", kind: "IF" },
        { hash: "h3", norm: "h3", kind: "IF" },
      ],
      [[["h2", true], ["h3", false], ["h2", false]]]
    );
    const approx = { matcher: ApproxMatcher.fromMeta(meta), options: { topK: 3, threshold: 0, prefilterSize: 20 } };
    const a = analyzeInvocation(repeated, meta, { dedupeConds: false, approx });
    assert.equal(a.exact.length, 1);
    assert.deepEqual(a.approx, []);
  });

  it("falls back to approximate matching when no chain matches exactly", () => {
    const meta = staticMeta(
      [
        { hash: "h2", norm: "h2", kind: "IF" },
        { hash: "h3", norm: "h3", kind: "IF" },
      ],
      [[["h2", true], ["h3", false]]]
    );
    const approx = { matcher: ApproxMatcher.fromMeta(meta), options: { topK: 3, threshold: 0, prefilterSize: 20 } };
    const a = analyzeInvocation(repeated, meta, { dedupeConds: false, approx });
    assert.deepEqual(a.exact, []);
    assert.deepEqual(a.approx.map((m) => m.chainId), [0]);
  });
});

describe("buildTriple", () => {
  const session: TestSession = {
    info: { testId: 1, suite: "Check", name: "Positive", full: "Check.Positive", file: "check_test.cc", line: 3 },
    windows: [],
    unattributed: [{ ...cond("stray", true, "IF"), invocationId: undefined }],
  };

  it("renders the window in wire form", () => {
    const window: AssertionWindow = {
      assertion: { kind: "assertion", testId: 1, assertId: 0, macro: "EXPECT_TRUE", file: "check_test.cc", line: 9, raw: "check(1)" },
      prefix: [],
      oracle: [{ invocationId: 0, callFile: "check_test.cc", callLine: 9, callExpr: "check(1)" }],
      conds: new Map([["0", [cond("h2", true, "IF")]]]),
    };
    const meta = staticMeta([], [[["h2", true]]]);
    const triple = buildTriple(session, window, meta, { dedupeConds: false });
    assert.deepEqual(triple, {
      test: { suite: "Check", name: "Positive", full: "Check.Positive", file: "check_test.cc", line: 3 },
      assertion: { assert_id: 0, macro: "EXPECT_TRUE", file: "check_test.cc", line: 9, raw: "check(1)" },
      prefix: [],
      oracle_calls: [{ invocation_id: 0, call_file: "check_test.cc", call_line: 9, call_expr: "check(1)" }],
      cond_chains: {
        "0": [{ file: "m.cc", line: 4, cond_norm: "h2", cond_hash: "h2", cond_kind: "IF", val: 1, flip: 0 }],
      },
      invocations: {
        "0": {
          func_hash: "f1",
          signature: "bool check(int)",
          matched_static: [{ source: "chains.meta.json", chain_id: 0, cond_hashes: [["h2", true]] }],
        },
      },
    });
  });

  it("emits a record for a window without oracle calls", () => {
    const window: AssertionWindow = {
      assertion: { kind: "assertion", testId: 1, assertId: 2 },
      prefix: [{ invocationId: 5 }],
      oracle: [],
      conds: new Map(),
    };
    const triple = buildTriple(session, window, staticMeta([], []), { dedupeConds: false });
    assert.deepEqual(triple.oracle_calls, []);
    assert.deepEqual(triple.prefix, [{ invocation_id: 5, call_file: null, call_line: null, call_expr: null }]);
    assert.deepEqual(triple.cond_chains, { "5": [] });
    assert.deepEqual(triple.invocations, {});
    assert.deepEqual(triple.assertion, { assert_id: 2, macro: null, file: null, line: null, raw: null });
  });

  it("serializes to a single JSON line", () => {
    const window: AssertionWindow = { assertion: { kind: "assertion", testId: 1 }, prefix: [], oracle: [], conds: new Map() };
    const line = serializeTriple(buildTriple(session, window, staticMeta([], []), { dedupeConds: false }));
    assert.equal(line.includes("\n"), false);
    assert.equal(line.includes("stray"), false);
  });
});
