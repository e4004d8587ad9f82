/**
 * Tests for the static meta loader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  loadMeta,
  parseChainsDoc,
  parseConditionsDoc,
  checkVersions,
  countChains,
  CHAINS_FILE,
  CONDITIONS_FILE,
  FUNCTIONS_FILE,
} from "./meta.js";
import type { Diagnostic } from "./diagnostics.js";

function writeMetaDir(docs: Record<string, unknown>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "condtrace-meta-"));
  for (const [name, data] of Object.entries(docs)) {
    fs.writeFileSync(path.join(dir, name), JSON.stringify(data), "utf-8");
  }
  return dir;
}

const conditions = {
  analysis_version: "7",
  conditions: [
    { id: 0, hash: "h0", file: "a.cc", line: 3, cond_norm: "n > 0", kind: "IF" },
    { id: 1, hash: "h1", file: "a.cc", line: 5, cond_norm: "i < n", kind: "LOOP" },
  ],
};

const chains = {
  analysis_version: "7",
  chains: [
    { func_hash: "f1", sequence: [{ cond_id: 1, value: true }, { cond_id: 0, value: 1 }] },
    { func_hash: "f1", sequence: [{ cond_id: 1, value: false }] },
    { func: "f2", sequence: [{ cond_id: 0, value: 0 }] },
  ],
};

const functions = {
  analysis_version: "7",
  functions: [{ hash: "f1", name: "sum", signature: "int sum(int)", file: "a.cc" }],
};

describe("loadMeta", () => {
  it("builds lookup tables from all three documents", () => {
    const dir = writeMetaDir({
      [CONDITIONS_FILE]: conditions,
      [CHAINS_FILE]: chains,
      [FUNCTIONS_FILE]: functions,
    });
    try {
      const { meta, diagnostics } = loadMeta(dir);
      assert.deepEqual(diagnostics, []);
      assert.equal(meta.conditionsById.get(0)?.hash, "h0");
      assert.equal(meta.conditionsByHash.get("h1")?.kind, "LOOP");
      assert.equal(meta.functionsByHash.get("f1")?.signature, "int sum(int)");
      assert.equal(countChains(meta), 3);

      const f1 = meta.chainsByFunc.get("f1") ?? [];
      assert.equal(f1.length, 2);
      assert.deepEqual(f1[0].steps, [
        { condHash: "h1", value: true },
        { condHash: "h0", value: true },
      ]);
      assert.equal(f1[1].chainId, 1);
      assert.equal(f1[1].source, path.join(dir, CHAINS_FILE));
      assert.deepEqual(meta.chainsByFunc.get("f2")?.[0].steps, [{ condHash: "h0", value: false }]);
      assert.deepEqual(meta.versions, { conditions: "7", chains: "7", functions: "7" });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("warns on analysis_version mismatch without aborting", () => {
    const dir = writeMetaDir({
      [CONDITIONS_FILE]: conditions,
      [CHAINS_FILE]: { ...chains, analysis_version: "8" },
      [FUNCTIONS_FILE]: functions,
    });
    try {
      const { meta, diagnostics } = loadMeta(dir);
      assert.deepEqual(diagnostics.map((d) => d.code), ["W_META_VERSION"]);
      assert.equal(
        diagnostics[0].message,
        "Meta analysis_version mismatch: functions=7, conditions=7, chains=8"
      );
      assert.equal(countChains(meta), 3);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("degrades to empty tables when documents are missing", () => {
    const dir = writeMetaDir({});
    try {
      const { meta, diagnostics } = loadMeta(dir);
      assert.deepEqual(diagnostics.map((d) => d.code), ["W_META_MISSING", "W_META_MISSING", "W_META_MISSING"]);
      assert.equal(meta.chainsByFunc.size, 0);
      assert.equal(meta.functionsByHash.size, 0);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports unreadable JSON and keeps loading the rest", () => {
    const dir = writeMetaDir({ [CONDITIONS_FILE]: conditions, [FUNCTIONS_FILE]: functions });
    fs.writeFileSync(path.join(dir, CHAINS_FILE), "{ not json", "utf-8");
    try {
      const { meta, diagnostics } = loadMeta(dir);
      assert.deepEqual(diagnostics.map((d) => d.code), ["W_META_INVALID"]);
      assert.equal(meta.conditionsById.size, 2);
      assert.equal(meta.chainsByFunc.size, 0);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("parseChainsDoc", () => {
  it("accepts a bare array of chains", () => {
    const diags: Diagnostic[] = [];
    const conds = parseConditionsDoc(conditions, "c.json", diags);
    const doc = parseChainsDoc([{ func_hash: "f9", sequence: [{ cond_id: 0, value: true }] }], "ch.json", conds.byId, diags);
    assert.equal(doc.version, undefined);
    assert.deepEqual(doc.byFunc.get("f9")?.[0].steps, [{ condHash: "h0", value: true }]);
    assert.deepEqual(diags, []);
  });

  it("drops steps whose condition id does not resolve", () => {
    const diags: Diagnostic[] = [];
    const conds = parseConditionsDoc(conditions, "c.json", diags);
    const doc = parseChainsDoc(
      { chains: [{ func_hash: "f1", sequence: [{ cond_id: 0, value: true }, { cond_id: 42, value: true }, { cond_id: "1", value: true }] }] },
      "ch.json",
      conds.byId,
      diags
    );
    assert.deepEqual(doc.byFunc.get("f1")?.[0].steps, [{ condHash: "h0", value: true }]);
    assert.deepEqual(diags.map((d) => d.code), ["W_META_INVALID"]);
  });

  it("skips chains without a function hash", () => {
    const diags: Diagnostic[] = [];
    const doc = parseChainsDoc({ chains: [{ sequence: [] }] }, "ch.json", new Map(), diags);
    assert.equal(doc.byFunc.size, 0);
  });
});

describe("checkVersions", () => {
  it("is silent when any document lacks a version", () => {
    assert.equal(checkVersions({ conditions: "1", chains: "2" }, "meta"), null);
  });

  it("is silent when all versions agree", () => {
    assert.equal(checkVersions({ conditions: "1", chains: "1", functions: "1" }, "meta"), null);
  });
});
