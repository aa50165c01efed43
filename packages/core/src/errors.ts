/**
 * Error taxonomy for the remix engine.
 *
 * Each class carries a stable `code` so callers (the CLI in particular) can
 * branch on the failure kind without relying on `instanceof` across package
 * boundaries.
 */

export type LoopwalkErrorCode =
  | "ERR_INPUT"
  | "ERR_EMPTY_INPUT"
  | "ERR_DEGENERATE_GRAPH"
  | "ERR_CONFIGURATION";

export class LoopwalkError extends Error {
  readonly code: LoopwalkErrorCode;

  constructor(code: LoopwalkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Input missing, unreadable or malformed. Fatal. */
export class InputError extends LoopwalkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ERR_INPUT", message, options);
  }
}

/** No beats were found, so there is nothing to emit. Fatal. */
export class EmptyInputError extends LoopwalkError {
  constructor(message = "No beats detected in input") {
    super("ERR_EMPTY_INPUT", message);
  }
}

/** Fewer than two beats, or a graph without a single edge. */
export class DegenerateGraphError extends LoopwalkError {
  constructor(message: string) {
    super("ERR_DEGENERATE_GRAPH", message);
  }
}

/** An option value is out of range. Raised before any analysis runs. */
export class ConfigurationError extends LoopwalkError {
  constructor(message: string) {
    super("ERR_CONFIGURATION", message);
  }
}

export function isLoopwalkError(error: unknown): error is LoopwalkError {
  return error instanceof LoopwalkError;
}
