/**
 * Session partitioner: splits the event stream into per-test sessions and,
 * within each test, into one window per assertion.
 *
 * A window opens at an `assertion` (or `assertion_begin`) event and closes at
 * the next one, at `test_end`, or at end of input. Its prefix is every
 * non-oracle invocation buffered since the previous cut; its oracle set is
 * every invocation classified as oracle while it was open.
 */
import { makeDiag } from "./diagnostics.js";
import type { Diagnostic } from "./diagnostics.js";
import type {
  Id,
  TraceEvent,
  AssertionEvent,
  CondEvent,
  InvocationStartEvent,
  TestStartEvent,
} from "./events.js";

export type InvocationRole = "prefix" | "oracle";

export interface Invocation {
  invocationId: Id;
  index?: number;
  segmentId?: Id;
  inOracle?: boolean;
  callFile?: string;
  callLine?: number;
  callExpr?: string;
  targetFunc?: string;
  status?: string;
  durationMs?: number;
}

export interface TestInfo {
  testId: Id;
  suite?: string;
  name?: string;
  full?: string;
  file?: string;
  line?: number;
  status?: string;
}

export interface AssertionWindow {
  assertion: AssertionEvent;
  prefix: Invocation[];
  oracle: Invocation[];
  /** Condition events recorded up to the window's close, by invocation key. */
  conds: ReadonlyMap<string, readonly CondEvent[]>;
}

export interface TestSession {
  info: TestInfo;
  windows: AssertionWindow[];
  /** Condition events recorded outside any invocation. */
  unattributed: CondEvent[];
}

export interface PartitionOptions {
  /** Substring matched against the suite name. */
  suite?: string;
  /** Substring matched against the test name or full name. */
  test?: string;
}

export interface PartitionResult {
  sessions: TestSession[];
  diagnostics: Diagnostic[];
}

/** Map key for an identifier; 0 and "0" are both valid ids. */
export function idKey(id: Id): string {
  return String(id);
}

interface OpenWindow {
  assertion: AssertionEvent;
  prefix: Invocation[];
  oracle: Invocation[];
  /** Opened by assertion_begin; the oracle region lasts until assertion_end. */
  explicit: boolean;
  regionOpen: boolean;
  /** Invocations started since the assertion event. */
  sinceAssertion: number;
}

export type OpenWindowView = Pick<OpenWindow, "assertion" | "explicit" | "regionOpen" | "sinceAssertion">;

function sameFile(a: string, b: string): boolean {
  return a === b || a.endsWith(`/${b}`) || b.endsWith(`/${a}`);
}

/**
 * Decide which side of the open window an invocation belongs to.
 *
 * An explicit `in_oracle` flag wins. Otherwise an explicit begin/end region
 * decides. With a single `assertion` event, a call site on the assertion's
 * file and line is oracle; without a call site, only the first invocation
 * started after the assertion event is oracle and later ones are prefix of
 * the next assertion.
 */
export function classifyInvocation(inv: Invocation, open: OpenWindowView): InvocationRole {
  if (inv.inOracle !== undefined) {
    return inv.inOracle ? "oracle" : "prefix";
  }
  if (open.explicit) {
    return open.regionOpen ? "oracle" : "prefix";
  }
  const { file, line } = open.assertion;
  if (
    inv.callFile !== undefined &&
    inv.callLine !== undefined &&
    file !== undefined &&
    line !== undefined
  ) {
    return sameFile(inv.callFile, file) && inv.callLine === line ? "oracle" : "prefix";
  }
  return open.sinceAssertion === 0 ? "oracle" : "prefix";
}

function toInvocation(ev: InvocationStartEvent): Invocation {
  return {
    invocationId: ev.invocationId,
    index: ev.index,
    segmentId: ev.segmentId,
    inOracle: ev.inOracle,
    callFile: ev.callFile,
    callLine: ev.callLine,
    callExpr: ev.callExpr,
    targetFunc: ev.targetFunc,
  };
}

class SessionBuilder {
  readonly session: TestSession;
  private prefixBuffer: Invocation[] = [];
  private open: OpenWindow | null = null;
  private invocations = new Map<string, Invocation>();
  private conds = new Map<string, CondEvent[]>();

  constructor(testId: Id) {
    this.session = { info: { testId }, windows: [], unattributed: [] };
  }

  start(ev: TestStartEvent): void {
    this.closeWindow();
    this.session.info = {
      testId: ev.testId,
      suite: ev.suite,
      name: ev.name,
      full: ev.full,
      file: ev.file,
      line: ev.line,
    };
    this.reset();
  }

  end(status: string | undefined): void {
    this.closeWindow();
    this.session.info.status = status;
    this.reset();
  }

  assertion(ev: AssertionEvent): void {
    this.closeWindow();
    const explicit = ev.kind === "assertion_begin";
    this.open = {
      assertion: ev,
      prefix: this.prefixBuffer,
      oracle: [],
      explicit,
      regionOpen: explicit,
      sinceAssertion: 0,
    };
    this.prefixBuffer = [];
  }

  assertionEnd(): void {
    if (this.open?.explicit) this.open.regionOpen = false;
  }

  invocationStart(ev: InvocationStartEvent): void {
    const inv = toInvocation(ev);
    this.invocations.set(idKey(inv.invocationId), inv);
    if (!this.open) {
      this.prefixBuffer.push(inv);
      return;
    }
    if (classifyInvocation(inv, this.open) === "oracle") {
      this.open.oracle.push(inv);
    } else {
      this.prefixBuffer.push(inv);
    }
    this.open.sinceAssertion++;
  }

  invocationEnd(invocationId: Id, status: string | undefined, durationMs: number | undefined): void {
    const inv = this.invocations.get(idKey(invocationId));
    if (!inv) return;
    inv.status = status;
    inv.durationMs = durationMs;
  }

  cond(ev: CondEvent): void {
    if (ev.invocationId === undefined) {
      this.session.unattributed.push(ev);
      return;
    }
    const key = idKey(ev.invocationId);
    let list = this.conds.get(key);
    if (!list) {
      list = [];
      this.conds.set(key, list);
    }
    list.push(ev);
  }

  closeWindow(): void {
    const open = this.open;
    if (!open) return;
    this.open = null;
    const conds = new Map<string, readonly CondEvent[]>();
    for (const inv of [...open.prefix, ...open.oracle]) {
      const key = idKey(inv.invocationId);
      conds.set(key, [...(this.conds.get(key) ?? [])]);
    }
    this.session.windows.push({
      assertion: open.assertion,
      prefix: open.prefix,
      oracle: open.oracle,
      conds,
    });
  }

  /** Pending prefix invocations with no following assertion are dropped. */
  private reset(): void {
    this.prefixBuffer = [];
    this.open = null;
    this.invocations.clear();
    this.conds.clear();
  }
}

export function shouldKeepTest(info: TestInfo, opts: PartitionOptions): boolean {
  if (opts.suite && !(info.suite ?? "").includes(opts.suite)) return false;
  if (opts.test && !(info.name ?? "").includes(opts.test) && !(info.full ?? "").includes(opts.test)) {
    return false;
  }
  return true;
}

/**
 * Events are processed strictly in arrival order; tests are independent.
 */
export function partitionSessions(
  events: readonly TraceEvent[],
  opts: PartitionOptions = {}
): PartitionResult {
  const builders = new Map<string, SessionBuilder>();
  const diagnostics: Diagnostic[] = [];
  let orphanConds = 0;

  const builderFor = (testId: Id): SessionBuilder => {
    const key = idKey(testId);
    let b = builders.get(key);
    if (!b) {
      b = new SessionBuilder(testId);
      builders.set(key, b);
    }
    return b;
  };

  for (const ev of events) {
    switch (ev.kind) {
      case "test_start":
        builderFor(ev.testId).start(ev);
        break;
      case "test_end":
        builderFor(ev.testId).end(ev.status);
        break;
      case "assertion":
      case "assertion_begin":
        builderFor(ev.testId).assertion(ev);
        break;
      case "assertion_end":
        builderFor(ev.testId).assertionEnd();
        break;
      case "invocation_start":
        builderFor(ev.testId).invocationStart(ev);
        break;
      case "invocation_end":
        builderFor(ev.testId).invocationEnd(ev.invocationId, ev.status, ev.durationMs);
        break;
      case "cond":
        if (ev.testId === undefined) {
          orphanConds++;
        } else {
          builderFor(ev.testId).cond(ev);
        }
        break;
    }
  }

  const sessions: TestSession[] = [];
  for (const b of builders.values()) {
    b.closeWindow();
    if (shouldKeepTest(b.session.info, opts)) sessions.push(b.session);
  }

  if (orphanConds > 0) {
    diagnostics.push(
      makeDiag("W_NO_TEST_ID", `${orphanConds} cond events carry no test_id and were dropped`)
    );
  }
  const unattributed = sessions.reduce((n, s) => n + s.unattributed.length, 0);
  if (unattributed > 0) {
    diagnostics.push(
      makeDiag(
        "W_UNATTRIBUTED_COND",
        `${unattributed} cond events carry no invocation_id and were kept out of call chains`
      )
    );
  }
  return { sessions, diagnostics };
}
