/**
 * lib/pipeline.ts - Main evaluation orchestrator
 *
 * Coordinates the full run: resolve paths, load rubric and scores,
 * compute ranked results, write both reports. Single entry point for
 * callers. Nothing is written unless scoring succeeds.
 */

import { join } from "path";
import {
  CSV_REPORT_NAME,
  MARKDOWN_REPORT_NAME,
  loadConfig,
  type ConfigOptions,
} from "./config";
import { loadCriteria } from "./criteria";
import { writeCsvReport, writeMarkdownReport } from "./report";
import { loadScores } from "./scores";
import { computeResults } from "./scorer";
import type { EvaluationSummary } from "./types";

export type RunEvaluationOptions = ConfigOptions;

/**
 * Run the evaluation end to end.
 *
 * @returns Ranked results, the validated rubric, and the report paths
 * @throws ScorecardError subclasses on any validation failure
 */
export function runEvaluation(
  options: RunEvaluationOptions = {},
): EvaluationSummary {
  const paths = loadConfig(options);

  const criteria = loadCriteria(paths.criteriaPath);
  const rows = loadScores(paths.scoresPath);
  const results = computeResults(criteria, rows);

  const outputs = {
    csv: join(paths.outputDir, CSV_REPORT_NAME),
    markdown: join(paths.outputDir, MARKDOWN_REPORT_NAME),
  };

  writeCsvReport(outputs.csv, results);
  writeMarkdownReport(outputs.markdown, results);

  return { criteria, results, outputs };
}
