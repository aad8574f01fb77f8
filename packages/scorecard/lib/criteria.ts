/**
 * lib/criteria.ts - Criteria loader and validator
 *
 * Reads the rubric YAML (scoring scale plus weighted criteria), coerces
 * each entry into a Criterion, and validates the weight sum and id
 * uniqueness.
 *
 * Rubric shape:
 *   scale: { min: 1, max: 5 }     # optional
 *   criteria:
 *     - { id: accuracy, name: Accuracy, weight: 0.6 }
 *     - { id: speed, name: Speed, weight: 0.4 }
 */

import { readFileSync, existsSync } from "fs";
import { load as loadYaml } from "js-yaml";
import { ConfigurationError } from "./errors";
import type { CriteriaConfig, Criterion, Scale } from "./types";

const WEIGHT_TOLERANCE = 1e-5;
const DEFAULT_SCALE: Scale = { min: 1, max: 5 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string | null {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return String(value).trim();
  }
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toInteger(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

function parseScale(raw: unknown, source?: string): Scale {
  if (raw === undefined || raw === null) {
    return DEFAULT_SCALE;
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError("Rubric 'scale' must be a mapping", source);
  }

  const table = raw;
  const bound = (key: "min" | "max"): number => {
    const value = table[key];
    if (value === undefined || value === null) {
      return DEFAULT_SCALE[key];
    }
    const n = toInteger(value);
    if (n === null) {
      throw new ConfigurationError(
        `Rubric 'scale.${key}' must be an integer, got: ${String(value)}`,
        source,
      );
    }
    return n;
  };

  const min = bound("min");
  const max = bound("max");

  if (min > max) {
    throw new ConfigurationError(
      `Rubric 'scale.min' (${min}) must not exceed 'scale.max' (${max})`,
      source,
    );
  }
  // max is the denominator of the normalized percentage
  if (max <= 0) {
    throw new ConfigurationError(
      `Rubric 'scale.max' must be positive, got: ${max}`,
      source,
    );
  }

  return { min, max };
}

function parseCriterion(raw: unknown, index: number, source?: string): Criterion {
  const prefix = `criteria[${index}]`;

  if (!isRecord(raw)) {
    throw new ConfigurationError(`${prefix} must be a mapping`, source);
  }

  const id = toText(raw.id);
  if (id === null) {
    throw new ConfigurationError(`${prefix} must have an 'id'`, source);
  }
  const name = toText(raw.name);
  if (name === null) {
    throw new ConfigurationError(`${prefix} must have a 'name'`, source);
  }
  const weight = toNumber(raw.weight);
  if (weight === null) {
    throw new ConfigurationError(
      `${prefix} 'weight' must be a number, got: ${String(raw.weight)}`,
      source,
    );
  }

  return Object.freeze({ id, name, weight });
}

/**
 * Validate a parsed rubric document.
 *
 * @param raw - Output of the YAML parser
 * @param source - Path used in error messages
 * @throws ConfigurationError on malformed fields, bad weight sum, or duplicate ids
 */
export function parseCriteria(raw: unknown, source?: string): CriteriaConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError("Rubric must be a YAML mapping", source);
  }

  const scale = parseScale(raw.scale, source);

  const rawCriteria = raw.criteria ?? [];
  if (!Array.isArray(rawCriteria)) {
    throw new ConfigurationError("Rubric 'criteria' must be a list", source);
  }

  const criteria = rawCriteria.map((c: unknown, i) =>
    parseCriterion(c, i, source),
  );

  const weightSum = criteria.reduce((sum, c) => sum + c.weight, 0);
  if (Math.abs(weightSum - 1.0) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(
      `Criteria weights must sum to 1.0, got: ${weightSum.toFixed(4)}`,
      source,
    );
  }

  const seen = new Set<string>();
  for (const c of criteria) {
    if (seen.has(c.id)) {
      throw new ConfigurationError(
        `Criterion IDs must be unique, duplicate: "${c.id}"`,
        source,
      );
    }
    seen.add(c.id);
  }

  return Object.freeze({ criteria: Object.freeze(criteria), scale });
}

/**
 * Load and validate the rubric YAML at `path`.
 */
export function loadCriteria(path: string): CriteriaConfig {
  if (!existsSync(path)) {
    throw new ConfigurationError("Rubric file not found", path);
  }

  const text = readFileSync(path, "utf-8");

  let raw: unknown;
  try {
    raw = loadYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse rubric YAML: ${message}`, path);
  }

  return parseCriteria(raw, path);
}
