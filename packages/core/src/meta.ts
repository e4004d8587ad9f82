/**
 * Static meta loader.
 *
 * Reads the analyzer's three documents from a meta directory, in this order:
 * conditions.meta.json, chains.meta.json, functions.meta.json.
 * Precedence matters: chain steps reference conditions by integer id.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { makeDiag } from "./diagnostics.js";
import type { Diagnostic } from "./diagnostics.js";

export const CONDITIONS_FILE = "conditions.meta.json";
export const CHAINS_FILE = "chains.meta.json";
export const FUNCTIONS_FILE = "functions.meta.json";

export interface StaticCondition {
  id?: number;
  hash?: string;
  file?: string;
  line?: number;
  norm?: string;
  kind?: string;
}

export interface StaticChainStep {
  condHash: string;
  value: boolean;
}

export interface StaticChain {
  funcHash: string;
  /** Position among the chains registered for the same function. */
  chainId: number;
  source: string;
  steps: readonly StaticChainStep[];
}

export interface StaticFunction {
  hash: string;
  name?: string;
  signature?: string;
  file?: string;
}

export interface MetaVersions {
  conditions?: string;
  chains?: string;
  functions?: string;
}

export interface StaticMeta {
  readonly conditionsById: ReadonlyMap<number, StaticCondition>;
  readonly conditionsByHash: ReadonlyMap<string, StaticCondition>;
  readonly chainsByFunc: ReadonlyMap<string, readonly StaticChain[]>;
  readonly functionsByHash: ReadonlyMap<string, StaticFunction>;
  readonly versions: MetaVersions;
}

export interface MetaLoadResult {
  meta: StaticMeta;
  diagnostics: Diagnostic[];
}

export function emptyMeta(): StaticMeta {
  return {
    conditionsById: new Map(),
    conditionsByHash: new Map(),
    chainsByFunc: new Map(),
    functionsByHash: new Map(),
    versions: {},
  };
}

// --- document schemas ---

const scalarText = z.union([z.string(), z.number()]).transform((v) => String(v));
const version = scalarText.nullish().transform((v) => v ?? undefined);

const conditionItemSchema = z.object({
  id: z.unknown(),
  hash: scalarText.optional(),
  cond_hash: scalarText.optional(),
  file: z.string().optional(),
  line: z.number().optional(),
  cond_norm: z.string().optional(),
  norm: z.string().optional(),
  cond: z.string().optional(),
  kind: z.string().optional(),
  cond_kind: z.string().optional(),
});

const conditionsDocSchema = z.object({
  analysis_version: version,
  conditions: z.array(z.unknown()).nullish(),
});

const chainStepSchema = z.object({
  cond_id: z.unknown(),
  value: z.unknown(),
});

const chainItemSchema = z.object({
  func_hash: scalarText.optional(),
  func: scalarText.optional(),
  sequence: z.array(z.unknown()).nullish(),
});

const chainsDocSchema = z.union([
  z.object({
    analysis_version: version,
    chains: z.array(z.unknown()).nullish(),
  }),
  z.array(z.unknown()).transform((chains) => ({ analysis_version: undefined, chains })),
]);

const functionItemSchema = z.object({
  hash: scalarText.optional(),
  name: z.string().optional(),
  signature: z.string().optional(),
  file: z.string().optional(),
});

const functionsDocSchema = z.object({
  analysis_version: version,
  functions: z.array(z.unknown()).nullish(),
});

function invalidDoc(file: string, error: z.ZodError): Diagnostic {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
  return makeDiag(
    "W_META_INVALID",
    `Unexpected document shape${issue ? `: ${issue.message}${where}` : ""}`,
    { file },
    "document ignored"
  );
}

function truthValue(v: unknown): boolean {
  return v === true || (typeof v === "number" && v !== 0);
}

// --- parsers ---

export interface ConditionsDoc {
  version?: string;
  byId: Map<number, StaticCondition>;
  byHash: Map<string, StaticCondition>;
}

export function parseConditionsDoc(
  data: unknown,
  file: string,
  diagnostics: Diagnostic[]
): ConditionsDoc {
  const doc: ConditionsDoc = { byId: new Map(), byHash: new Map() };
  const parsed = conditionsDocSchema.safeParse(data);
  if (!parsed.success) {
    diagnostics.push(invalidDoc(file, parsed.error));
    return doc;
  }
  doc.version = parsed.data.analysis_version;

  let skipped = 0;
  for (const raw of parsed.data.conditions ?? []) {
    const item = conditionItemSchema.safeParse(raw);
    if (!item.success) {
      skipped++;
      continue;
    }
    const c = item.data;
    const cond: StaticCondition = {
      id: typeof c.id === "number" && Number.isInteger(c.id) ? c.id : undefined,
      hash: c.hash ?? c.cond_hash,
      file: c.file,
      line: c.line,
      norm: c.cond_norm ?? c.norm ?? c.cond,
      kind: c.kind ?? c.cond_kind,
    };
    if (cond.id !== undefined) {
      doc.byId.set(cond.id, cond);
    }
    if (cond.hash) {
      doc.byHash.set(cond.hash, cond);
    }
  }
  if (skipped > 0) {
    diagnostics.push(makeDiag("W_META_INVALID", `Skipped ${skipped} malformed condition entries`, { file }));
  }
  return doc;
}

export interface ChainsDoc {
  version?: string;
  byFunc: Map<string, StaticChain[]>;
}

export function parseChainsDoc(
  data: unknown,
  file: string,
  conditionsById: ReadonlyMap<number, StaticCondition>,
  diagnostics: Diagnostic[]
): ChainsDoc {
  const doc: ChainsDoc = { byFunc: new Map() };
  const parsed = chainsDocSchema.safeParse(data);
  if (!parsed.success) {
    diagnostics.push(invalidDoc(file, parsed.error));
    return doc;
  }
  doc.version = parsed.data.analysis_version;

  let unresolved = 0;
  for (const raw of parsed.data.chains ?? []) {
    const item = chainItemSchema.safeParse(raw);
    if (!item.success) continue;
    const funcHash = item.data.func_hash ?? item.data.func;
    if (!funcHash) continue;

    const steps: StaticChainStep[] = [];
    for (const rawStep of item.data.sequence ?? []) {
      const step = chainStepSchema.safeParse(rawStep);
      if (!step.success) continue;
      const condId = step.data.cond_id;
      if (typeof condId !== "number" || !Number.isInteger(condId)) continue;
      const hash = conditionsById.get(condId)?.hash;
      if (!hash) {
        unresolved++;
        continue;
      }
      steps.push({ condHash: hash, value: truthValue(step.data.value) });
    }

    let list = doc.byFunc.get(funcHash);
    if (!list) {
      list = [];
      doc.byFunc.set(funcHash, list);
    }
    list.push({ funcHash, chainId: list.length, source: file, steps });
  }
  if (unresolved > 0) {
    diagnostics.push(
      makeDiag(
        "W_META_INVALID",
        `${unresolved} chain steps reference unknown condition ids`,
        { file },
        `check ${CONDITIONS_FILE} was produced by the same analysis run`
      )
    );
  }
  return doc;
}

export interface FunctionsDoc {
  version?: string;
  byHash: Map<string, StaticFunction>;
}

export function parseFunctionsDoc(
  data: unknown,
  file: string,
  diagnostics: Diagnostic[]
): FunctionsDoc {
  const doc: FunctionsDoc = { byHash: new Map() };
  const parsed = functionsDocSchema.safeParse(data);
  if (!parsed.success) {
    diagnostics.push(invalidDoc(file, parsed.error));
    return doc;
  }
  doc.version = parsed.data.analysis_version;
  for (const raw of parsed.data.functions ?? []) {
    const item = functionItemSchema.safeParse(raw);
    if (!item.success || !item.data.hash) continue;
    const { hash, name, signature, file: srcFile } = item.data;
    doc.byHash.set(hash, { hash, name, signature, file: srcFile });
  }
  return doc;
}

/**
 * Warn when all three documents carry a version and they disagree.
 */
export function checkVersions(versions: MetaVersions, metaDir: string): Diagnostic | null {
  const { functions, conditions, chains } = versions;
  if (!functions || !conditions || !chains) return null;
  if (functions === conditions && conditions === chains) return null;
  return makeDiag(
    "W_META_VERSION",
    `Meta analysis_version mismatch: functions=${functions}, conditions=${conditions}, chains=${chains}`,
    { file: metaDir },
    "regenerate all meta documents from one analysis run"
  );
}

function readJsonDoc(file: string, diagnostics: Diagnostic[]): unknown {
  if (!fs.existsSync(file)) {
    diagnostics.push(makeDiag("W_META_MISSING", "Meta document not found", { file }, "static matching disabled for this table"));
    return undefined;
  }
  try {
    return JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    diagnostics.push(makeDiag("W_META_INVALID", `Cannot read meta document: ${msg}`, { file }, "document ignored"));
    return undefined;
  }
}

export function loadMeta(metaDir: string): MetaLoadResult {
  const diagnostics: Diagnostic[] = [];

  const condPath = path.join(metaDir, CONDITIONS_FILE);
  const condData = readJsonDoc(condPath, diagnostics);
  const conditions: ConditionsDoc =
    condData === undefined
      ? { byId: new Map(), byHash: new Map() }
      : parseConditionsDoc(condData, condPath, diagnostics);

  const chainPath = path.join(metaDir, CHAINS_FILE);
  const chainData = readJsonDoc(chainPath, diagnostics);
  const chains: ChainsDoc =
    chainData === undefined
      ? { byFunc: new Map() }
      : parseChainsDoc(chainData, chainPath, conditions.byId, diagnostics);

  const funcPath = path.join(metaDir, FUNCTIONS_FILE);
  const funcData = readJsonDoc(funcPath, diagnostics);
  const functions: FunctionsDoc =
    funcData === undefined
      ? { byHash: new Map() }
      : parseFunctionsDoc(funcData, funcPath, diagnostics);

  const versions: MetaVersions = {
    conditions: conditions.version,
    chains: chains.version,
    functions: functions.version,
  };
  const mismatch = checkVersions(versions, metaDir);
  if (mismatch) diagnostics.push(mismatch);

  return {
    meta: {
      conditionsById: conditions.byId,
      conditionsByHash: conditions.byHash,
      chainsByFunc: chains.byFunc,
      functionsByHash: functions.byHash,
      versions,
    },
    diagnostics,
  };
}

export function countChains(meta: StaticMeta): number {
  let n = 0;
  for (const list of meta.chainsByFunc.values()) n += list.length;
  return n;
}
