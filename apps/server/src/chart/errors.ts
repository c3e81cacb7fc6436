/**
 * Chart errors carry an HTTP status and a stable code so the express error
 * handler can surface them without knowing the engine.
 */
export class ChartError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Which OHLC ordering relation a bar broke, in check order. */
export type BarViolation = "open>high" | "close>high" | "low>high" | "open<low" | "close<low";

export type ValidationFailure = "empty" | BarViolation;

export class DataValidationError extends ChartError {
  constructor(
    readonly reason: ValidationFailure,
    readonly index?: number,
  ) {
    super(
      index === undefined ? "series is empty" : `bar ${index}: ${reason}`,
      "INVALID_SERIES",
      400,
    );
  }
}

/** The staging directory for a render could not be created or removed. */
export class ResourceError extends ChartError {
  constructor(message: string, cause?: unknown) {
    super(message, "STAGING_FAILED", 500, { cause });
  }
}

export class CodecError extends ChartError {
  constructor(message: string, cause?: unknown) {
    super(message, "CODEC_FAILED", 500, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
