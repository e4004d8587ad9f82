/**
 * condtrace meta - static meta summary command
 */
import * as fs from "node:fs";
import { loadMeta, countChains, formatDiagnostic, formatDiagnostics, makeDiag } from "@condtrace/core";
import type { Diagnostic, MetaVersions } from "@condtrace/core";

export interface MetaSummary {
  dir: string;
  conditions: number;
  functions: number;
  chains: number;
  chainFunctions: number;
  versions: MetaVersions;
  diagnostics: Diagnostic[];
}

function formatVersions(v: MetaVersions): string {
  return `conditions=${v.conditions ?? "-"}, chains=${v.chains ?? "-"}, functions=${v.functions ?? "-"}`;
}

export async function runMeta(dir: string, opts: { json?: boolean }): Promise<number> {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    console.error(formatDiagnostic(makeDiag("E_IO", `Meta directory not found: ${dir}`), !opts.json));
    return 4;
  }

  const { meta, diagnostics } = loadMeta(dir);
  const summary: MetaSummary = {
    dir,
    conditions: meta.conditionsByHash.size,
    functions: meta.functionsByHash.size,
    chains: countChains(meta),
    chainFunctions: meta.chainsByFunc.size,
    versions: meta.versions,
    diagnostics,
  };

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log("Static Meta Summary");
  console.log(`  Directory:  ${summary.dir}`);
  console.log(`  Conditions: ${summary.conditions}`);
  console.log(`  Functions:  ${summary.functions}`);
  console.log(`  Chains:     ${summary.chains} (${summary.chainFunctions} functions)`);
  console.log(`  Versions:   ${formatVersions(summary.versions)}`);
  if (diagnostics.length > 0) console.error(formatDiagnostics(diagnostics, true));
  return 0;
}
