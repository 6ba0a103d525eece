/**
 * @strata/math — Arithmetic error type.
 */

/** Error codes for integer arithmetic. */
export type MathErrorCode =
  | "DIVISION_BY_ZERO"
  | "UNDERFLOW"
  | "NEGATIVE_INPUT"
  | "INVALID_FORMAT";

/**
 * Structured error from the arithmetic helpers.
 * Engines pre-validate their inputs, so reaching one of these from an
 * engine operation indicates a violated precondition.
 */
export class MathError extends Error {
  public readonly code: MathErrorCode;

  constructor(code: MathErrorCode, message: string) {
    super(message);
    this.name = "MathError";
    this.code = code;
  }
}
