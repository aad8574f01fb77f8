/**
 * lib/errors.ts - Error taxonomy
 *
 * Every failure is fatal. Each class carries the offending entity so the
 * CLI can report it without parsing messages.
 */

export type ErrorKind = "configuration" | "input" | "value" | "lookup";

export abstract class ScorecardError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed rubric or config file. */
export class ConfigurationError extends ScorecardError {
  readonly kind = "configuration";
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message);
    this.source = source;
  }
}

/** Empty or malformed scores source. */
export class InputError extends ScorecardError {
  readonly kind = "input";
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message);
    this.source = source;
  }
}

export class ScoreValueError extends ScorecardError {
  readonly kind = "value";
  readonly tool: string;
  readonly criterion: string;
  readonly value: string;

  constructor(message: string, tool: string, criterion: string, value: string) {
    super(`${message} for tool "${tool}", criterion "${criterion}"`);
    this.tool = tool;
    this.criterion = criterion;
    this.value = value;
  }
}

/** A row has no column for a criterion declared in the rubric. */
export class MissingColumnError extends ScorecardError {
  readonly kind = "lookup";
  readonly tool: string;
  readonly criterion: string;

  constructor(tool: string, criterion: string) {
    super(`Scores source has no column "${criterion}" (tool "${tool}")`);
    this.tool = tool;
    this.criterion = criterion;
  }
}

export function isScorecardError(err: unknown): err is ScorecardError {
  return err instanceof ScorecardError;
}
