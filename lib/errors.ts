/**
 * Raised when an input parameter falls outside its valid domain. Nothing is
 * computed once this has been thrown, so callers never see partial results.
 */
export class InvalidParameterError extends Error {
  readonly field: string;
  readonly constraint: string;

  constructor(field: string, constraint: string, value?: unknown) {
    const shown = value === undefined ? "" : ` (got ${String(value)})`;
    super(`Invalid ${field}: must be ${constraint}${shown}`);
    this.name = "InvalidParameterError";
    this.field = field;
    this.constraint = constraint;
  }
}

export function isInvalidParameterError(err: unknown): err is InvalidParameterError {
  return err instanceof InvalidParameterError;
}
