#!/usr/bin/env tsx
/**
 * scorecard CLI - Thin wrapper around runEvaluation()
 *
 * Usage:
 *   scorecard [--criteria PATH] [--scores PATH] [--output DIR] [options]
 *
 * Output: completion message (or JSON with --json) to stdout, errors to stderr
 * Exit codes: 0 = success, 1 = error
 */

import { existsSync, realpathSync } from "fs";
import { fileURLToPath } from "url";
import { runEvaluation, isScorecardError } from "./index";

interface ParsedArgs {
  criteriaPath?: string;
  scoresPath?: string;
  outputDir?: string;
  configPath?: string;
  json: boolean;
  unknown: string[];
}

function printUsage(): void {
  process.stderr.write(`scorecard - Weighted rubric scoring for tool evaluations

Usage:
  scorecard [options]

Options:
  --criteria PATH    Rubric YAML (default: criteria.yaml)
  --scores PATH      Raw scores CSV (default: scores.csv)
  --output DIR       Report directory (default: output)
  --config PATH      Config file (default: ./scorecard.toml if present)
  --json             Print results as JSON instead of a completion message
  -h, --help         Show this help

Writes <output>/results.csv and <output>/results.md, ranked by weighted score.

Exit codes: 0 = success, 1 = error

Examples:
  scorecard
  scorecard --criteria rubric.yaml --scores march.csv --output reports/march
`);
}

function parseArgs(argv: string[]): ParsedArgs | null {
  const args = argv.slice(2);
  const parsed: ParsedArgs = { json: false, unknown: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--criteria") {
      parsed.criteriaPath = args[++i];
    } else if (arg === "--scores") {
      parsed.scoresPath = args[++i];
    } else if (arg === "--output") {
      parsed.outputDir = args[++i];
    } else if (arg === "--config") {
      parsed.configPath = args[++i];
    } else if (arg === "--json") {
      parsed.json = true;
    } else if (arg === "--help" || arg === "-h") {
      return null;
    } else {
      parsed.unknown.push(arg);
    }
  }

  return parsed;
}

/**
 * Run the CLI against a process.argv-shaped array.
 *
 * @returns Exit code: 0 = success, 1 = error
 */
export function run(argv: string[]): number {
  const parsed = parseArgs(argv);

  if (!parsed) {
    printUsage();
    return 0;
  }

  if (parsed.unknown.length > 0) {
    process.stderr.write(`Error: unknown argument: ${parsed.unknown[0]}\n\n`);
    printUsage();
    return 1;
  }

  try {
    const { results, outputs } = runEvaluation({
      criteriaPath: parsed.criteriaPath,
      scoresPath: parsed.scoresPath,
      outputDir: parsed.outputDir,
      configPath: parsed.configPath,
    });

    if (parsed.json) {
      console.log(JSON.stringify({ success: true, results, outputs }, null, 2));
    } else {
      console.log("Evaluation complete.");
    }
    return 0;
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    if (parsed.json) {
      const kind = isScorecardError(err) ? err.kind : "internal";
      console.log(JSON.stringify({ success: false, error, kind }, null, 2));
    }
    process.stderr.write(`Error: ${error}\n`);
    return 1;
  }
}

// Only when executed directly, not when imported
function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked || !existsSync(invoked)) {
    return false;
  }
  return realpathSync(invoked) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  process.exit(run(process.argv));
}
