/**
 * lib/scores.ts - Raw score loader
 *
 * Reads the scores CSV into one mapping per tool row. Cells stay as text:
 * numeric parsing and range checks happen in the scorer so every bad value
 * goes through one error path.
 */

import { readFileSync, existsSync } from "fs";
import { parseCsv } from "./csv";
import { InputError } from "./errors";
import type { ScoreRow } from "./types";

export const TOOL_COLUMN = "tool";
export const NOTES_COLUMN = "notes";

/**
 * Parse scores CSV text. The first record is the header.
 *
 * Short records get "" for their missing trailing cells; cells past the
 * header width are dropped.
 *
 * @throws InputError when there are no data rows or no 'tool' column
 */
export function parseScores(text: string, source?: string): ScoreRow[] {
  const [header, ...records] = parseCsv(text, source);

  if (!header || records.length === 0) {
    throw new InputError("Scores source is empty", source);
  }
  if (!header.includes(TOOL_COLUMN)) {
    throw new InputError(
      `Scores source must contain a '${TOOL_COLUMN}' column`,
      source,
    );
  }

  // fromEntries defines own properties, so a "__proto__" column stays a column
  return records.map((record) =>
    Object.freeze(
      Object.fromEntries(
        header.map((column, i): [string, string] => [column, record[i] ?? ""]),
      ),
    ),
  );
}

/**
 * Load raw score rows from the CSV at `path`.
 */
export function loadScores(path: string): ScoreRow[] {
  if (!existsSync(path)) {
    throw new InputError("Scores file not found", path);
  }
  return parseScores(readFileSync(path, "utf-8"), path);
}
