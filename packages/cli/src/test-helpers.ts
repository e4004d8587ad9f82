/**
 * Shared fixtures for CLI command tests.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export async function captureCmd(
  fn: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `condtrace-cli-${prefix}-`));
}

/** One test, one assertion, a looping prefix call and a single-branch oracle call. */
export const SAMPLE_EVENTS: Array<Record<string, unknown>> = [
  { type: "test_start", test_id: 1, suite: "Sum", name: "Loop", full: "Sum.Loop", file: "sum_test.cc", line: 4 },
  { type: "invocation_start", test_id: 1, invocation_id: 0, in_oracle: 0, call_expr: "sum(v)" },
  { type: "cond", test_id: 1, invocation_id: 0, func: "f1", cond_hash: "h1", cond_norm: "i < n", cond_kind: "LOOP", val: 1 },
  { type: "cond", test_id: 1, invocation_id: 0, func: "f1", cond_hash: "h2", cond_norm: "v[i] > 0", cond_kind: "IF", val: 1 },
  { type: "cond", test_id: 1, invocation_id: 0, func: "f1", cond_hash: "h1", cond_norm: "i < n", cond_kind: "LOOP", val: 0 },
  { type: "invocation_end", test_id: 1, invocation_id: 0, status: "ok" },
  { type: "assertion", test_id: 1, assert_id: 0, macro: "EXPECT_TRUE", file: "sum_test.cc", line: 9 },
  { type: "invocation_start", test_id: 1, invocation_id: 1, in_oracle: 1, call_expr: "positive(s)" },
  { type: "cond", test_id: 1, invocation_id: 1, func: "f2", cond_hash: "h3", cond_norm: "s > 0", cond_kind: "IF", val: 1 },
  { type: "test_end", test_id: 1, status: "PASSED" },
];

export function writeLog(dir: string, extraLines: string[] = []): string {
  const file = path.join(dir, "run.jsonl");
  const lines = [...SAMPLE_EVENTS.map((e) => JSON.stringify(e)), ...extraLines];
  fs.writeFileSync(file, lines.join("\n") + "\n", "utf-8");
  return file;
}

export function writeMetaDir(dir: string): string {
  const metaDir = path.join(dir, "meta");
  fs.mkdirSync(metaDir);
  const docs: Record<string, unknown> = {
    "conditions.meta.json": {
      analysis_version: "1",
      conditions: [
        { id: 0, hash: "h1", cond_norm: "i < n", kind: "LOOP" },
        { id: 1, hash: "h2", cond_norm: "v[i] > 0", kind: "IF" },
        { id: 2, hash: "h3", cond_norm: "s > 0", kind: "IF" },
      ],
    },
    "chains.meta.json": {
      analysis_version: "1",
      chains: [
        { func_hash: "f1", sequence: [{ cond_id: 0, value: true }, { cond_id: 1, value: true }] },
        { func_hash: "f2", sequence: [{ cond_id: 2, value: false }] },
      ],
    },
    "functions.meta.json": {
      analysis_version: "1",
      functions: [{ hash: "f1", name: "sum", signature: "int sum(const std::vector<int>&)" }],
    },
  };
  for (const [name, data] of Object.entries(docs)) {
    fs.writeFileSync(path.join(metaDir, name), JSON.stringify(data), "utf-8");
  }
  return metaDir;
}
