/**
 * Reconciler errors.
 *
 * The engine is pure data transformation, so the taxonomy is narrow.
 * Conditions that are not failures (ambiguous matches, empty datasets)
 * are returned as data, never thrown.
 */

/** Error codes for reconciler operations. */
export type ReconcilerErrorCode =
  | "MALFORMED_LEVEL"
  | "INVALID_TABLE"
  | "INVALID_MAPPING";

/**
 * Structured error from the reconciler.
 */
export class ReconcilerError extends Error {
  public readonly code: ReconcilerErrorCode;

  constructor(code: ReconcilerErrorCode, message: string) {
    super(message);
    this.name = "ReconcilerError";
    this.code = code;
  }
}

/**
 * A level value that cannot be read as a non-negative integer.
 *
 * Thrown by `parseLevel`; the dataset assembler catches it and treats the
 * row's level as absent so one bad row never blocks the rest.
 */
export class MalformedLevelError extends ReconcilerError {
  public readonly rawValue: string;

  constructor(rawValue: string) {
    super("MALFORMED_LEVEL", `Level "${rawValue}" is not a non-negative integer`);
    this.name = "MalformedLevelError";
    this.rawValue = rawValue;
  }
}
