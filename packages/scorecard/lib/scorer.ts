/**
 * lib/scorer.ts - Weighted score computation and ranking
 *
 * For every tool row: parse each criterion's cell, check it against the
 * scale, accumulate the weighted and raw totals, then rank by weighted
 * score. Throws on the first bad value; there are no partial results.
 */

import { MissingColumnError, ScoreValueError } from "./errors";
import { NOTES_COLUMN, TOOL_COLUMN } from "./scores";
import type {
  CriteriaConfig,
  EvaluationResult,
  Scale,
  ScoreRow,
} from "./types";

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// toFixed() switches to exponent notation from here on
const FIXED_LIMIT = 1e21;

interface ScoreContext {
  tool: string;
  criterion: string;
}

/**
 * Parse one raw score cell and validate it against the inclusive scale.
 *
 * @throws ScoreValueError on non-numeric text or an out-of-range value
 */
export function parseScore(
  value: string,
  scale: Scale,
  context: ScoreContext,
): number {
  const text = value.trim();

  if (!DECIMAL_PATTERN.test(text)) {
    throw new ScoreValueError(
      `Score "${value}" is not a number`,
      context.tool,
      context.criterion,
      value,
    );
  }

  const score = Number(text);
  if (!(scale.min <= score && score <= scale.max)) {
    throw new ScoreValueError(
      `Score ${text} out of range [${scale.min}, ${scale.max}]`,
      context.tool,
      context.criterion,
      value,
    );
  }

  return score;
}

/**
 * Fixed-point text with `places` decimals. Exact halfway values round to
 * the even neighbour (toFixed alone rounds them away from zero), and large
 * magnitudes never use exponent notation.
 */
export function formatFixed(value: number, places: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const sign = value < 0 ? "-" : "";
  const abs = Math.abs(value);

  // Doubles this large are integers
  if (abs >= FIXED_LIMIT) {
    const fraction = places > 0 ? "." + "0".repeat(places) : "";
    return `${sign}${BigInt(abs).toString()}${fraction}`;
  }

  // toFixed(100) is the exact decimal expansion for any tie candidate
  const exact = abs.toFixed(100);
  const cut = exact.indexOf(".") + 1 + places;
  const rest = exact.slice(cut);

  if (rest[0] === "5" && /^0*$/.test(rest.slice(1))) {
    const truncated = exact.slice(0, places > 0 ? cut : cut - 1);
    const lastDigit = Number(truncated[truncated.length - 1]);
    return sign + (lastDigit % 2 === 0 ? truncated : abs.toFixed(places));
  }

  return value.toFixed(places);
}

function scoreRow(config: CriteriaConfig, row: ScoreRow): EvaluationResult {
  const tool = (row[TOOL_COLUMN] ?? "").trim();
  let weightedTotal = 0;
  let rawTotal = 0;
  let maxRaw = 0;

  for (const criterion of config.criteria) {
    if (!Object.prototype.hasOwnProperty.call(row, criterion.id)) {
      throw new MissingColumnError(tool, criterion.id);
    }

    const score = parseScore(row[criterion.id], config.scale, {
      tool,
      criterion: criterion.id,
    });

    weightedTotal += score * criterion.weight;
    rawTotal += score;
    maxRaw += config.scale.max;
  }

  const normalized = (rawTotal / maxRaw) * 100.0;

  return {
    tool,
    weightedScore: formatFixed(weightedTotal, 3),
    normalizedPercent: formatFixed(normalized, 1),
    notes: row[NOTES_COLUMN] ?? "",
  };
}

/**
 * Sort by the numeric value of the formatted weighted score, highest first.
 * Equal scores keep their input order (Array.prototype.sort is stable).
 */
export function rankResults(
  results: readonly EvaluationResult[],
): EvaluationResult[] {
  return [...results].sort(
    (a, b) => Number(b.weightedScore) - Number(a.weightedScore),
  );
}

/**
 * Score every row against the rubric and return the ranked results.
 */
export function computeResults(
  config: CriteriaConfig,
  rows: readonly ScoreRow[],
): EvaluationResult[] {
  return rankResults(rows.map((row) => scoreRow(config, row)));
}
