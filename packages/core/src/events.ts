/**
 * Event stream loader: one JSON record per line, tagged by `type`.
 *
 * Records are validated at the boundary into the closed TraceEvent union.
 * Optional fields stay `undefined` when the key is absent; an identifier of
 * 0 is a real identifier.
 */
import * as fs from "node:fs";
import * as zlib from "node:zlib";
import { z } from "zod";
import { makeDiag, CondtraceError } from "./diagnostics.js";
import type { Diagnostic } from "./diagnostics.js";

export type Id = number | string;

export const COND_KINDS = ["IF", "CASE", "DEFAULT", "LOOP", "TRY"] as const;
export type CondKind = (typeof COND_KINDS)[number];

export interface TestStartEvent {
  kind: "test_start";
  testId: Id;
  suite?: string;
  name?: string;
  full?: string;
  file?: string;
  line?: number;
  hash?: string;
}

export interface TestEndEvent {
  kind: "test_end";
  testId: Id;
  status?: string;
}

export interface AssertionEvent {
  kind: "assertion" | "assertion_begin";
  testId: Id;
  assertId?: Id;
  macro?: string;
  file?: string;
  line?: number;
  raw?: string;
}

export interface AssertionEndEvent {
  kind: "assertion_end";
  testId: Id;
  assertId?: Id;
}

export interface InvocationStartEvent {
  kind: "invocation_start";
  testId: Id;
  invocationId: Id;
  index?: number;
  segmentId?: Id;
  inOracle?: boolean;
  callFile?: string;
  callLine?: number;
  callExpr?: string;
  targetFunc?: string;
}

export interface InvocationEndEvent {
  kind: "invocation_end";
  testId: Id;
  invocationId: Id;
  segmentId?: Id;
  status?: string;
  durationMs?: number;
}

export interface CondEvent {
  kind: "cond";
  testId?: Id;
  invocationId?: Id;
  func?: string;
  condHash: string;
  file?: string;
  line?: number;
  norm?: string;
  condKind?: CondKind;
  val: boolean;
  flip: boolean;
}

export type TraceEvent =
  | TestStartEvent
  | TestEndEvent
  | AssertionEvent
  | AssertionEndEvent
  | InvocationStartEvent
  | InvocationEndEvent
  | CondEvent;

export type TraceEventKind = TraceEvent["kind"];

export const EVENT_KINDS: readonly TraceEventKind[] = [
  "test_start",
  "test_end",
  "assertion",
  "assertion_begin",
  "assertion_end",
  "invocation_start",
  "invocation_end",
  "cond",
];

// --- wire schemas ---

const id = z.union([z.number().int(), z.string()]);
const flag = z
  .union([z.boolean(), z.number()])
  .transform((v) => (typeof v === "boolean" ? v : v !== 0));
const hash = z.union([z.string(), z.number()]).transform((v) => String(v));
const condKind = z
  .string()
  .transform((s) => s.toUpperCase())
  .pipe(z.enum(COND_KINDS));

const testStartSchema = z.object({
  type: z.literal("test_start"),
  test_id: id,
  suite: z.string().optional(),
  name: z.string().optional(),
  full: z.string().optional(),
  file: z.string().optional(),
  line: z.number().optional(),
  hash: hash.optional(),
});

const testEndSchema = z.object({
  type: z.literal("test_end"),
  test_id: id,
  status: z.string().optional(),
});

const assertionFields = {
  test_id: id,
  assert_id: id.optional(),
  macro: z.string().optional(),
  file: z.string().optional(),
  line: z.number().optional(),
  raw: z.string().optional(),
};

const assertionSchema = z.object({ type: z.literal("assertion"), ...assertionFields });
const assertionBeginSchema = z.object({ type: z.literal("assertion_begin"), ...assertionFields });

const assertionEndSchema = z.object({
  type: z.literal("assertion_end"),
  test_id: id,
  assert_id: id.optional(),
});

const invocationStartSchema = z.object({
  type: z.literal("invocation_start"),
  test_id: id,
  invocation_id: id,
  index: z.number().optional(),
  segment_id: id.optional(),
  in_oracle: flag.nullish(),
  call_file: z.string().optional(),
  call_line: z.number().optional(),
  call_expr: z.string().optional(),
  target_func: hash.optional(),
});

const invocationEndSchema = z.object({
  type: z.literal("invocation_end"),
  test_id: id,
  invocation_id: id,
  segment_id: id.optional(),
  status: z.string().optional(),
  duration_ms: z.number().optional(),
});

const condSchema = z.object({
  type: z.literal("cond"),
  test_id: id.optional(),
  invocation_id: id.optional(),
  func: hash.optional(),
  cond_hash: hash,
  file: z.string().optional(),
  line: z.number().optional(),
  cond_norm: z.string().optional(),
  cond_kind: condKind.optional(),
  val: flag.nullish(),
  norm_flip: flag.nullish(),
});

const rawEventSchema = z.discriminatedUnion("type", [
  testStartSchema,
  testEndSchema,
  assertionSchema,
  assertionBeginSchema,
  assertionEndSchema,
  invocationStartSchema,
  invocationEndSchema,
  condSchema,
]);

type RawEvent = z.infer<typeof rawEventSchema>;

function toTraceEvent(raw: RawEvent): TraceEvent {
  switch (raw.type) {
    case "test_start":
      return {
        kind: raw.type,
        testId: raw.test_id,
        suite: raw.suite,
        name: raw.name,
        full: raw.full,
        file: raw.file,
        line: raw.line,
        hash: raw.hash,
      };
    case "test_end":
      return { kind: raw.type, testId: raw.test_id, status: raw.status };
    case "assertion":
    case "assertion_begin":
      return {
        kind: raw.type,
        testId: raw.test_id,
        assertId: raw.assert_id,
        macro: raw.macro,
        file: raw.file,
        line: raw.line,
        raw: raw.raw,
      };
    case "assertion_end":
      return { kind: raw.type, testId: raw.test_id, assertId: raw.assert_id };
    case "invocation_start":
      return {
        kind: raw.type,
        testId: raw.test_id,
        invocationId: raw.invocation_id,
        index: raw.index,
        segmentId: raw.segment_id,
        inOracle: raw.in_oracle ?? undefined,
        callFile: raw.call_file,
        callLine: raw.call_line,
        callExpr: raw.call_expr,
        targetFunc: raw.target_func,
      };
    case "invocation_end":
      return {
        kind: raw.type,
        testId: raw.test_id,
        invocationId: raw.invocation_id,
        segmentId: raw.segment_id,
        status: raw.status,
        durationMs: raw.duration_ms,
      };
    case "cond":
      return {
        kind: raw.type,
        testId: raw.test_id,
        invocationId: raw.invocation_id,
        func: raw.func,
        condHash: raw.cond_hash,
        file: raw.file,
        line: raw.line,
        norm: raw.cond_norm,
        condKind: raw.cond_kind,
        val: raw.val ?? false,
        flip: raw.norm_flip ?? false,
      };
  }
}

const KNOWN_TYPES = new Set<string>(EVENT_KINDS);

export interface LineResult {
  event?: TraceEvent;
  diagnostic?: Diagnostic;
}

/**
 * Parse one log line. Blank lines yield neither an event nor a diagnostic.
 */
export function parseEventLine(line: string, lineNo: number, file = "<input>"): LineResult {
  const trimmed = line.trim();
  if (!trimmed) return {};
  const loc = { file, line: lineNo };

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { diagnostic: makeDiag("W_MALFORMED_LINE", `Malformed JSON: ${msg}`, loc, "line skipped") };
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { diagnostic: makeDiag("W_MALFORMED_LINE", "Record must be a JSON object", loc, "line skipped") };
  }
  const type = "type" in parsed ? parsed.type : undefined;
  if (typeof type !== "string" || !KNOWN_TYPES.has(type)) {
    return {
      diagnostic: makeDiag("W_UNKNOWN_EVENT", `Unknown event type '${String(type)}'`, loc, "line skipped"),
    };
  }

  const result = rawEventSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
    const detail = issue ? `${issue.message}${where}` : "invalid record";
    return {
      diagnostic: makeDiag("W_INVALID_EVENT", `Invalid '${type}' event: ${detail}`, loc, "line skipped"),
    };
  }
  return { event: toTraceEvent(result.data) };
}

export interface EventLogStats {
  lines: number;
  events: number;
  skipped: number;
}

export interface EventLog {
  events: TraceEvent[];
  diagnostics: Diagnostic[];
  stats: EventLogStats;
}

export function parseEventLog(content: string, file = "<input>"): EventLog {
  const events: TraceEvent[] = [];
  const diagnostics: Diagnostic[] = [];
  const lines = content.split("\n");
  let nonBlank = 0;

  lines.forEach((line, i) => {
    if (!line.trim()) return;
    nonBlank++;
    const res = parseEventLine(line, i + 1, file);
    if (res.event) events.push(res.event);
    if (res.diagnostic) diagnostics.push(res.diagnostic);
  });

  return {
    events,
    diagnostics,
    stats: { lines: nonBlank, events: events.length, skipped: nonBlank - events.length },
  };
}

/**
 * Read a log file from disk, gunzipping `.gz` files.
 * The log is the one mandatory input, so failure to read it is fatal.
 */
export function readEventLog(file: string): EventLog {
  let content: string;
  try {
    const buf = fs.readFileSync(file);
    content = file.endsWith(".gz") ? zlib.gunzipSync(buf).toString("utf-8") : buf.toString("utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CondtraceError("E_IO", `Error reading log file: ${msg}`, { file });
  }
  return parseEventLog(content, file);
}
