/**
 * lib/types.ts - All TypeScript types for scorecard
 *
 * Rubric configuration, raw score rows, and ranked evaluation results.
 */

export interface Criterion {
  readonly id: string;
  readonly name: string;
  readonly weight: number; // fraction of the total, all weights sum to 1.0
}

export interface Scale {
  readonly min: number; // inclusive
  readonly max: number; // inclusive
}

export interface CriteriaConfig {
  readonly criteria: readonly Criterion[];
  readonly scale: Scale;
}

/** One CSV record keyed by header name. Cells are unparsed text. */
export type ScoreRow = Readonly<Record<string, string>>;

export interface EvaluationResult {
  readonly tool: string;
  readonly weightedScore: string; // 3 decimal places
  readonly normalizedPercent: string; // 1 decimal place, 0-100
  readonly notes: string;
}

export interface ScorecardPaths {
  criteriaPath: string;
  scoresPath: string;
  outputDir: string;
}

export interface ReportOutputs {
  csv: string;
  markdown: string;
}

export interface EvaluationSummary {
  criteria: CriteriaConfig;
  results: EvaluationResult[];
  outputs: ReportOutputs;
}
