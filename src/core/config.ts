import { basename, isAbsolute, join, resolve } from "node:path";
import type { ClassifierKind, SearchRoot } from "./types.js";

export type AuditLogFiles = Record<ClassifierKind, string>;

export interface AnalyzerConfig {
  rootDir: string;
  searchRoots: SearchRoot[];
  logFiles: AuditLogFiles;
  trajectoryExtension: string;
  sweepReportPath: string;
  spotcheckMaxSteps: number;
}

export interface AnalyzerConfigOverrides {
  rootDir?: string;
  searchRoots?: SearchRoot[];
  logDir?: string;
  logFiles?: Partial<AuditLogFiles>;
  trajectoryExtension?: string;
  sweepReportPath?: string;
  spotcheckMaxSteps?: number;
}

export type ConfigEnv = Record<string, string | undefined>;

export const DEFAULT_SEARCH_ROOT_DIRS: readonly SearchRoot[] = Object.freeze([
  { label: "claude", dir: "claude-sonnet-trajs" },
  { label: "qwen", dir: "Qwen-2.5-Coder-Instruct-trajs" },
]);

export const DEFAULT_LOG_FILE_NAMES: Readonly<AuditLogFiles> = Object.freeze({
  reproduction: "locate_reproduction_code.log",
  search: "locate_search.log",
  toolUse: "locate_tool_use.log",
});

export const DEFAULT_TRAJECTORY_EXTENSION = ".traj";
export const DEFAULT_SWEEP_REPORT_NAME = "trajscope_sweep_report.txt";
export const DEFAULT_SPOTCHECK_MAX_STEPS = 20;

function absolutize(rawPath: string, baseDir: string): string {
  return isAbsolute(rawPath) ? rawPath : resolve(baseDir, rawPath);
}

/**
 * Parse a comma list of `label=dir` or bare `dir` entries. Bare entries are
 * labelled by their directory name.
 */
export function parseSearchRoots(raw: string): SearchRoot[] {
  const roots: SearchRoot[] = [];
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.indexOf("=");
    if (separator > 0) {
      roots.push({
        label: trimmed.slice(0, separator).trim(),
        dir: trimmed.slice(separator + 1).trim(),
      });
      continue;
    }
    roots.push({ label: basename(trimmed), dir: trimmed });
  }
  return roots;
}

/** Non-negative integer written in plain digits; anything else is undefined. */
export function parseCount(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

function parseEnvCount(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const parsed = parseCount(raw);
  if (parsed === undefined) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return parsed;
}

/** Overrides win over environment variables, which win over defaults. */
export function resolveAnalyzerConfig(
  overrides: AnalyzerConfigOverrides = {},
  env: ConfigEnv = process.env,
): AnalyzerConfig {
  const rootDir = resolve(overrides.rootDir ?? env.TRAJSCOPE_ROOT ?? process.cwd());

  const envRoots = env.TRAJSCOPE_SEARCH_ROOTS
    ? parseSearchRoots(env.TRAJSCOPE_SEARCH_ROOTS)
    : undefined;
  const rawRoots =
    overrides.searchRoots ??
    (envRoots && envRoots.length > 0 ? envRoots : DEFAULT_SEARCH_ROOT_DIRS);
  const searchRoots = rawRoots.map((root) => ({
    label: root.label,
    dir: absolutize(root.dir, rootDir),
  }));

  const logDir = absolutize(overrides.logDir ?? env.TRAJSCOPE_LOG_DIR ?? rootDir, rootDir);
  const logFiles: AuditLogFiles = {
    reproduction: absolutize(
      overrides.logFiles?.reproduction ?? DEFAULT_LOG_FILE_NAMES.reproduction,
      logDir,
    ),
    search: absolutize(overrides.logFiles?.search ?? DEFAULT_LOG_FILE_NAMES.search, logDir),
    toolUse: absolutize(
      overrides.logFiles?.toolUse ?? DEFAULT_LOG_FILE_NAMES.toolUse,
      logDir,
    ),
  };

  return {
    rootDir,
    searchRoots,
    logFiles,
    trajectoryExtension: overrides.trajectoryExtension ?? DEFAULT_TRAJECTORY_EXTENSION,
    sweepReportPath: absolutize(
      overrides.sweepReportPath ?? join(rootDir, DEFAULT_SWEEP_REPORT_NAME),
      rootDir,
    ),
    spotcheckMaxSteps:
      overrides.spotcheckMaxSteps ??
      parseEnvCount(env.TRAJSCOPE_SPOTCHECK_MAX_STEPS, "TRAJSCOPE_SPOTCHECK_MAX_STEPS") ??
      DEFAULT_SPOTCHECK_MAX_STEPS,
  };
}
