/**
 * lib/config.ts - Input/output path resolution
 *
 * Precedence: explicit options > scorecard.toml > defaults.
 *
 * scorecard.toml (optional, looked up in the working directory):
 *   [paths]
 *   criteria = "rubric/criteria.yaml"
 *   scores = "data/scores.csv"
 *   output = "reports"
 *
 * Relative paths in the file resolve against the file's own directory;
 * defaults and explicit options resolve against the working directory.
 */

import { readFileSync, existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { parse as parseToml } from "smol-toml";
import { ConfigurationError } from "./errors";
import type { ScorecardPaths } from "./types";

export const CONFIG_FILENAME = "scorecard.toml";
export const CSV_REPORT_NAME = "results.csv";
export const MARKDOWN_REPORT_NAME = "results.md";

const DEFAULT_PATHS = {
  criteria: "criteria.yaml",
  scores: "scores.csv",
  output: "output",
} as const;

type PathKey = keyof typeof DEFAULT_PATHS;

const PATH_KEYS: readonly PathKey[] = ["criteria", "scores", "output"];

export interface ConfigOptions {
  criteriaPath?: string;
  scoresPath?: string;
  outputDir?: string;
  /** Explicit config file. Must exist when given. */
  configPath?: string;
  /** Base for defaults and relative options. Defaults to process.cwd(). */
  cwd?: string;
}

function readPathsTable(path: string): Partial<Record<PathKey, string>> {
  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse config: ${message}`, path);
  }

  const table = parsed.paths;
  if (table === undefined) {
    return {};
  }
  if (typeof table !== "object" || table === null || Array.isArray(table)) {
    throw new ConfigurationError("Invalid config: [paths] must be a table", path);
  }

  const entries = table as Record<string, unknown>;
  const baseDir = dirname(path);
  const result: Partial<Record<PathKey, string>> = {};

  for (const key of PATH_KEYS) {
    const value = entries[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || value.length === 0) {
      throw new ConfigurationError(
        `Invalid config: paths.${key} must be a non-empty string`,
        path,
      );
    }
    result[key] = resolve(baseDir, value);
  }

  return result;
}

/**
 * Resolve the rubric, scores and output locations for one run.
 */
export function loadConfig(options: ConfigOptions = {}): ScorecardPaths {
  const cwd = options.cwd ?? process.cwd();

  let fromFile: Partial<Record<PathKey, string>> = {};
  if (options.configPath) {
    const configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError("Config file not found", configPath);
    }
    fromFile = readPathsTable(configPath);
  } else {
    const implicit = join(cwd, CONFIG_FILENAME);
    if (existsSync(implicit)) {
      fromFile = readPathsTable(implicit);
    }
  }

  const pick = (key: PathKey, override: string | undefined): string =>
    override
      ? resolve(cwd, override)
      : (fromFile[key] ?? resolve(cwd, DEFAULT_PATHS[key]));

  return {
    criteriaPath: pick("criteria", options.criteriaPath),
    scoresPath: pick("scores", options.scoresPath),
    outputDir: pick("output", options.outputDir),
  };
}
