/**
 * scorecard - Weighted rubric scoring and ranking for tool evaluations
 *
 * Loads a rubric YAML (scale plus weighted criteria) and a CSV of raw
 * per-tool scores, computes weighted and normalized totals, ranks tools by
 * weighted score, and writes results.csv and results.md.
 *
 * Usage:
 *   import { runEvaluation } from "scorecard";
 *   const { results, outputs } = runEvaluation({ outputDir: "reports" });
 *   // results[0] is the top-ranked tool
 */

export type {
  Criterion,
  Scale,
  CriteriaConfig,
  ScoreRow,
  EvaluationResult,
  EvaluationSummary,
  ReportOutputs,
  ScorecardPaths,
} from "./lib/types";

export {
  ScorecardError,
  ConfigurationError,
  InputError,
  ScoreValueError,
  MissingColumnError,
  isScorecardError,
} from "./lib/errors";
export type { ErrorKind } from "./lib/errors";

export { loadConfig, CONFIG_FILENAME } from "./lib/config";
export type { ConfigOptions } from "./lib/config";

export { loadCriteria, parseCriteria } from "./lib/criteria";
export { loadScores, parseScores } from "./lib/scores";
export {
  parseScore,
  formatFixed,
  computeResults,
  rankResults,
} from "./lib/scorer";
export {
  renderCsv,
  renderMarkdown,
  writeCsvReport,
  writeMarkdownReport,
} from "./lib/report";
export { runEvaluation } from "./lib/pipeline";
export type { RunEvaluationOptions } from "./lib/pipeline";

// CSV utilities (for advanced use)
export { parseCsv, formatCsvRecord } from "./lib/csv";
