#!/usr/bin/env node
/**
 * condtrace - test-trace oracle triple CLI
 */
import { Command } from "commander";
import { VERSION } from "@condtrace/core";
import { runReport } from "./cmd-report.js";
import type { ReportCmdOptions } from "./cmd-report.js";
import { runSummary } from "./cmd-summary.js";
import { runMeta } from "./cmd-meta.js";

const program = new Command();

program
  .name("condtrace")
  .description("Pair test assertions with the condition chains of the calls they check")
  .version(VERSION);

program
  .command("report")
  .description("Emit one JSONL triple per assertion")
  .option("--logs <path>", "JSONL event log (.gz accepted)")
  .option("--meta <dir>", "Directory holding the static meta documents")
  .option("--out <path>", "Output file, or - for stdout", "-")
  .option("--dedupe-conds", "Show each condition once per chain", false)
  .option("--approx-match", "Rank static chains when no exact match exists", false)
  .option("--approx-topk <n>", "Approximate candidates kept per invocation")
  .option("--approx-threshold <x>", "Minimum approximate score, 0..1")
  .option("--approx-prefilter <n>", "Candidates kept by the Jaccard prefilter")
  .option("--suite <substr>", "Only tests whose suite contains this")
  .option("--test <substr>", "Only tests whose name contains this")
  .option("--pretty", "Human-readable diagnostics", false)
  .action(async (opts: ReportCmdOptions) => {
    const code = await runReport(opts);
    process.exit(code);
  });

program
  .command("summary")
  .description("Summarize an event log")
  .argument("<logs>", "JSONL event log (.gz accepted)")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runSummary(file, opts);
    process.exit(code);
  });

program
  .command("meta")
  .description("Summarize a static meta directory")
  .argument("<dir>", "Directory holding the static meta documents")
  .option("--json", "Output as JSON", false)
  .action(async (dir: string, opts: { json?: boolean }) => {
    const code = await runMeta(dir, opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["report", "summary", "meta", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
