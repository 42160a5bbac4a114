export type AnalysisErrorCode = "invalid-input";

/**
 * Raised for input rejected before any extraction takes place, such as a
 * file path that lies outside the declared analysis root.
 */
export class InvalidInputError extends Error {
  readonly code: AnalysisErrorCode = "invalid-input";

  constructor(
    message: string,
    readonly input?: string,
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export function isInvalidInputError(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}
