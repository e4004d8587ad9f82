/**
 * Tests for condtrace summary.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { runSummary } from "./cmd-summary.js";
import type { EventLogSummary } from "./cmd-summary.js";
import { captureCmd, makeTmpDir, writeLog } from "./test-helpers.js";

describe("condtrace summary", () => {
  it("counts events by kind", async () => {
    const tmpDir = makeTmpDir("summary");
    const logs = writeLog(tmpDir, ["{oops", JSON.stringify({ type: "cond", test_id: 1, cond_hash: "h9", val: 0 })]);
    try {
      const result = await captureCmd(() => runSummary(logs, { json: true }));
      assert.equal(result.code, 0);
      const summary = JSON.parse(result.stdout) as EventLogSummary;
      assert.equal(summary.lines, 12);
      assert.equal(summary.events, 11);
      assert.equal(summary.skipped, 1);
      assert.equal(summary.tests, 1);
      assert.equal(summary.invocations, 2);
      assert.equal(summary.conds, 5);
      assert.equal(summary.unattributedConds, 1);
      assert.equal(summary.byKind.invocation_end, 1);
      assert.equal(summary.byKind.assertion_begin, 0);
      assert.ok(result.stderr.includes('"code":"W_MALFORMED_LINE"'));
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("prints a readable summary", async () => {
    const tmpDir = makeTmpDir("summary");
    const logs = writeLog(tmpDir);
    try {
      const result = await captureCmd(() => runSummary(logs, {}));
      assert.equal(result.code, 0);
      const lines = result.stdout.split("\n");
      assert.equal(lines[0], "Event Log Summary");
      assert.ok(lines.includes("  Cond events:        4"));
      assert.ok(lines.includes("    assertion: 1"));
      assert.equal(lines.includes("    assertion_end: 0"), false);
      assert.equal(result.stderr, "");
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns exit code 4 with E_IO when the log cannot be read", async () => {
    const tmpDir = makeTmpDir("summary");
    try {
      const result = await captureCmd(() => runSummary(path.join(tmpDir, "missing.jsonl"), {}));
      assert.equal(result.code, 4);
      assert.ok(result.stderr.startsWith("error[E_IO]"));
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
