/**
 * Error taxonomy for the batch run. Per-record errors are caught and logged
 * by the loop that owns the record; StoreCorruptionError and ConfigError
 * end the run before anything is written.
 */

export class ExtractionError extends Error {
  constructor(
    message: string,
    readonly context: { origin: string; index?: number }
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class GeocodeFailureError extends Error {
  constructor(
    readonly address: string,
    cause?: unknown
  ) {
    super(`Geocoding failed for "${address}"`, { cause });
    this.name = "GeocodeFailureError";
  }
}

export class DistanceFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DistanceFailureError";
  }
}

export class BudgetExceededError extends Error {
  constructor(
    readonly category: string,
    readonly limit: number
  ) {
    super(`API budget for ${category} exhausted (${limit} calls)`);
    this.name = "BudgetExceededError";
  }
}

export class StoreCorruptionError extends Error {
  constructor(
    readonly file: string,
    detail: string
  ) {
    super(`${file}: ${detail}`);
    this.name = "StoreCorruptionError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Errors that must abort the whole run. */
export function isFatal(err: unknown): boolean {
  return err instanceof StoreCorruptionError || err instanceof ConfigError;
}
