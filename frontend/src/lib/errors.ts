export type EstimatorErrorKind = "domain" | "configuration" | "lookup";

export class EstimatorError extends Error {
  public readonly kind: EstimatorErrorKind;

  constructor(kind: EstimatorErrorKind, message: string) {
    super(message);
    this.name = "EstimatorError";
    this.kind = kind;
  }
}

/** A month or age outside the configured bounds. */
export class DomainError extends EstimatorError {
  constructor(message: string) {
    super("domain", message);
    this.name = "DomainError";
  }
}

/** Invalid range, step, multiplier, tuition figure or band partition. */
export class ConfigurationError extends EstimatorError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

/** Unknown bracket, region, care type or series point. */
export class LookupError extends EstimatorError {
  public readonly key: string;

  constructor(key: string, message: string) {
    super("lookup", message);
    this.name = "LookupError";
    this.key = key;
  }
}

export function isEstimatorError(value: unknown): value is EstimatorError {
  return value instanceof EstimatorError;
}
