/**
 * condtrace configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { makeDiag } from "./diagnostics.js";
import type { Diagnostic } from "./diagnostics.js";
import { DEFAULT_APPROX_OPTIONS } from "./approx.js";

export const PROJECT_CONFIG_FILE = ".condtracerc.json";

export interface ApproxConfig {
  enabled: boolean;
  topK: number;
  threshold: number;
  prefilterSize: number;
}

export interface Config {
  dedupeConds: boolean;
  approx: ApproxConfig;
}

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
  diagnostics: Diagnostic[];
}

export const DEFAULT_CONFIG: Config = {
  dedupeConds: false,
  approx: { enabled: false, ...DEFAULT_APPROX_OPTIONS },
};

const configSchema = z
  .object({
    dedupeConds: z.boolean().optional(),
    approx: z
      .object({
        enabled: z.boolean().optional(),
        topK: z.number().int().positive().optional(),
        threshold: z.number().min(0).max(1).optional(),
        prefilterSize: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

function tryLoadConfigFile(filePath: string, diagnostics: Diagnostic[]): Config | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    diagnostics.push(makeDiag("W_CONFIG_INVALID", `Cannot read config: ${msg}`, { file: filePath }, "file ignored"));
    return null;
  }
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
    diagnostics.push(
      makeDiag("W_CONFIG_INVALID", `Invalid config${issue ? `: ${issue.message}${where}` : ""}`, { file: filePath }, "file ignored")
    );
    return null;
  }
  return {
    dedupeConds: parsed.data.dedupeConds ?? DEFAULT_CONFIG.dedupeConds,
    approx: { ...DEFAULT_CONFIG.approx, ...parsed.data.approx },
  };
}

/**
 * Precedence: ./.condtracerc.json > ~/.condtrace/config.json > defaults.
 * An invalid file is reported and skipped, falling through to the next one.
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const diagnostics: Diagnostic[] = [];
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".condtrace", "config.json");

  const project = tryLoadConfigFile(projectPath, diagnostics);
  if (project) {
    return { config: project, source: "project", path: projectPath, diagnostics };
  }

  const user = tryLoadConfigFile(userPath, diagnostics);
  if (user) {
    return { config: user, source: "user", path: userPath, diagnostics };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null, diagnostics };
}
