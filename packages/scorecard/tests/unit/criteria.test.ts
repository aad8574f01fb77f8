import { describe, test, expect } from "vitest";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { loadCriteria, parseCriteria } from "../../lib/criteria";
import { ConfigurationError } from "../../lib/errors";

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), "..", "fixtures");

describe("loadCriteria", () => {
  test("loads scale and criteria in source order", () => {
    const config = loadCriteria(join(FIXTURES, "criteria.yaml"));

    expect(config.scale).toEqual({ min: 1, max: 5 });
    expect(config.criteria.map((c) => c.id)).toEqual([
      "accuracy",
      "speed",
      "cost",
    ]);
  });

  test("trims id and name", () => {
    const config = loadCriteria(join(FIXTURES, "criteria.yaml"));

    expect(config.criteria[1]).toEqual({
      id: "speed",
      name: "Speed",
      weight: 0.3,
    });
  });

  test("defaults scale to 1..5 when absent", () => {
    const config = loadCriteria(join(FIXTURES, "criteria-no-scale.yaml"));

    expect(config.scale).toEqual({ min: 1, max: 5 });
    expect(config.criteria).toHaveLength(2);
  });

  test("criteria are frozen", () => {
    const config = loadCriteria(join(FIXTURES, "criteria.yaml"));

    expect(Object.isFrozen(config.criteria)).toBe(true);
    expect(Object.isFrozen(config.criteria[0])).toBe(true);
  });

  test("throws on missing rubric file", () => {
    expect(() => loadCriteria(join(FIXTURES, "nonexistent.yaml"))).toThrow(
      "Rubric file not found",
    );
  });

  test("throws on invalid YAML", () => {
    expect(() => loadCriteria(join(FIXTURES, "invalid.yaml"))).toThrow(
      "Failed to parse rubric YAML",
    );
  });
});

describe("parseCriteria", () => {
  test("rejects weights summing to 0.98", () => {
    const raw = {
      criteria: [
        { id: "a", name: "A", weight: 0.5 },
        { id: "b", name: "B", weight: 0.48 },
      ],
    };

    expect(() => parseCriteria(raw)).toThrow(ConfigurationError);
    expect(() => parseCriteria(raw)).toThrow(
      "Criteria weights must sum to 1.0, got: 0.9800",
    );
  });

  test("rejects weights summing to 1.02", () => {
    const raw = {
      criteria: [
        { id: "a", name: "A", weight: 0.52 },
        { id: "b", name: "B", weight: 0.5 },
      ],
    };

    expect(() => parseCriteria(raw)).toThrow("Criteria weights must sum to 1.0");
  });

  test("accepts float rounding within tolerance", () => {
    const raw = {
      criteria: [
        { id: "a", name: "A", weight: 0.1 },
        { id: "b", name: "B", weight: 0.1 },
        { id: "c", name: "C", weight: 0.1 },
        { id: "d", name: "D", weight: 0.7 },
      ],
    };

    expect(parseCriteria(raw).criteria).toHaveLength(4);
  });

  test("rejects duplicate ids", () => {
    const raw = {
      criteria: [
        { id: "accuracy", name: "Accuracy", weight: 0.5 },
        { id: "accuracy", name: "Accuracy again", weight: 0.5 },
      ],
    };

    expect(() => parseCriteria(raw)).toThrow(
      'Criterion IDs must be unique, duplicate: "accuracy"',
    );
  });

  test("ids that only differ by whitespace are duplicates", () => {
    const raw = {
      criteria: [
        { id: "speed", name: "Speed", weight: 0.5 },
        { id: " speed", name: "Speed", weight: 0.5 },
      ],
    };

    expect(() => parseCriteria(raw)).toThrow("Criterion IDs must be unique");
  });

  test("coerces numeric ids and string weights", () => {
    const config = parseCriteria({
      criteria: [
        { id: 7, name: "Seven", weight: "0.25" },
        { id: "x", name: "X", weight: 0.75 },
      ],
    });

    expect(config.criteria[0]).toEqual({ id: "7", name: "Seven", weight: 0.25 });
  });

  test("reads integer scale given as strings", () => {
    const config = parseCriteria({
      scale: { min: "0", max: "10" },
      criteria: [{ id: "a", name: "A", weight: 1 }],
    });

    expect(config.scale).toEqual({ min: 0, max: 10 });
  });

  test("fills a missing scale bound with its default", () => {
    const config = parseCriteria({
      scale: { max: 10 },
      criteria: [{ id: "a", name: "A", weight: 1 }],
    });

    expect(config.scale).toEqual({ min: 1, max: 10 });
  });

  test("rejects a non-integer scale bound", () => {
    expect(() =>
      parseCriteria({
        scale: { min: 1.5, max: 5 },
        criteria: [{ id: "a", name: "A", weight: 1 }],
      }),
    ).toThrow("Rubric 'scale.min' must be an integer, got: 1.5");
  });

  test("rejects min above max", () => {
    expect(() =>
      parseCriteria({
        scale: { min: 5, max: 1 },
        criteria: [{ id: "a", name: "A", weight: 1 }],
      }),
    ).toThrow("Rubric 'scale.min' (5) must not exceed 'scale.max' (1)");
  });

  test("rejects a non-positive max", () => {
    expect(() =>
      parseCriteria({
        scale: { min: -5, max: 0 },
        criteria: [{ id: "a", name: "A", weight: 1 }],
      }),
    ).toThrow("Rubric 'scale.max' must be positive, got: 0");
  });

  test("names the entry with a missing field", () => {
    expect(() =>
      parseCriteria({
        criteria: [
          { id: "a", name: "A", weight: 0.5 },
          { name: "B", weight: 0.5 },
        ],
      }),
    ).toThrow("criteria[1] must have an 'id'");
  });

  test("rejects a non-numeric weight", () => {
    expect(() =>
      parseCriteria({ criteria: [{ id: "a", name: "A", weight: "heavy" }] }),
    ).toThrow("criteria[0] 'weight' must be a number, got: heavy");
  });

  test("rejects an empty criteria list through the weight sum", () => {
    expect(() => parseCriteria({ criteria: [] })).toThrow(
      "Criteria weights must sum to 1.0, got: 0.0000",
    );
  });

  test("rejects a document that is not a mapping", () => {
    expect(() => parseCriteria(null)).toThrow("Rubric must be a YAML mapping");
  });

  test("appends the source path to messages", () => {
    expect(() => parseCriteria({ criteria: [] }, "rubric.yaml")).toThrow(
      "(rubric.yaml)",
    );
  });
});
