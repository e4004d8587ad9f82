/**
 * @condtrace/core - trace partitioning and static chain matching
 */
export * from "./diagnostics.js";
export {
  parseEventLine,
  parseEventLog,
  readEventLog,
  COND_KINDS,
  EVENT_KINDS,
} from "./events.js";
export type {
  Id,
  CondKind,
  TraceEvent,
  TraceEventKind,
  TestStartEvent,
  TestEndEvent,
  AssertionEvent,
  AssertionEndEvent,
  InvocationStartEvent,
  InvocationEndEvent,
  CondEvent,
  EventLog,
  EventLogStats,
  LineResult,
} from "./events.js";
export {
  loadMeta,
  emptyMeta,
  countChains,
  checkVersions,
  parseConditionsDoc,
  parseChainsDoc,
  parseFunctionsDoc,
  CONDITIONS_FILE,
  CHAINS_FILE,
  FUNCTIONS_FILE,
} from "./meta.js";
export type {
  StaticMeta,
  StaticCondition,
  StaticChain,
  StaticChainStep,
  StaticFunction,
  MetaVersions,
  MetaLoadResult,
} from "./meta.js";
export { partitionSessions, classifyInvocation, shouldKeepTest, idKey } from "./partition.js";
export type {
  Invocation,
  InvocationRole,
  TestInfo,
  TestSession,
  AssertionWindow,
  PartitionOptions,
  PartitionResult,
} from "./partition.js";
export { collectChain, dedupeByHash, resolveFuncHash, effectiveValue } from "./chains.js";
export type { ChainStep, ConditionChain } from "./chains.js";
export { compressLoops, isLoopStep } from "./compress.js";
export { matchExact } from "./match.js";
export type { ExactMatch } from "./match.js";
export {
  ApproxMatcher,
  StaticIndex,
  alignWithDiffs,
  lcpLength,
  lcsLength,
  jaccard,
  semanticId,
  kindWeight,
  DEFAULT_APPROX_OPTIONS,
} from "./approx.js";
export type { ApproxMatch, ApproxOptions, DiffStep, SidValue } from "./approx.js";
export { buildTriple, analyzeInvocation, serializeTriple, slimCond } from "./emitter.js";
export type { TripleRecord, InvocationBlock, EmitOptions, InvocationAnalysis } from "./emitter.js";
export { generateReport } from "./report.js";
export type { ReportOptions, ReportResult, ReportStats } from "./report.js";
export { resolveConfig, DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from "./config.js";
export type { Config, ApproxConfig, ResolvedConfig } from "./config.js";
export { VERSION } from "./version.js";
