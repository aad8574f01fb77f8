/**
 * lib/report.ts - CSV and Markdown report writers
 *
 * Both renderers take the ranked results as-is: no re-sorting and no
 * re-formatting of the score strings.
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { formatCsvRecord } from "./csv";
import type { EvaluationResult } from "./types";

export const CSV_HEADER = [
  "tool",
  "weighted_score",
  "normalized_percent",
  "notes",
] as const;

export const MARKDOWN_TITLE = "# Tool Evaluation Results";

export function renderCsv(results: readonly EvaluationResult[]): string {
  const lines = [formatCsvRecord(CSV_HEADER)];

  for (const r of results) {
    lines.push(
      formatCsvRecord([r.tool, r.weightedScore, r.normalizedPercent, r.notes]),
    );
  }

  return lines.join("\n") + "\n";
}

// Keep each result on a single table row
function markdownCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n|\r/g, " ");
}

export function renderMarkdown(results: readonly EvaluationResult[]): string {
  const lines = [
    MARKDOWN_TITLE,
    "",
    "| Rank | Tool | Weighted Score | Normalized (0-100) | Notes |",
    "|---:|---|---:|---:|---|",
  ];

  results.forEach((r, i) => {
    lines.push(
      `| ${i + 1} | ${markdownCell(r.tool)} | ${r.weightedScore} | ${r.normalizedPercent} | ${markdownCell(r.notes)} |`,
    );
  });

  return lines.join("\n") + "\n";
}

function writeReport(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
}

export function writeCsvReport(
  path: string,
  results: readonly EvaluationResult[],
): void {
  writeReport(path, renderCsv(results));
}

export function writeMarkdownReport(
  path: string,
  results: readonly EvaluationResult[],
): void {
  writeReport(path, renderMarkdown(results));
}
