export type MonitorErrorKind =
  | "fetch"
  | "normalization"
  | "state_load"
  | "state_save"
  | "delivery";

/**
 * Base class for every failure the monitor distinguishes. The `kind` tag lets
 * callers branch without `instanceof` chains.
 */
export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Transport failure or non-success response from the release feed. */
export class FetchError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("fetch", message, options);
  }
}

/** Raw payload lacks a usable version or has malformed fields. */
export class NormalizationError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("normalization", message, options);
  }
}

/** Persisted state exists but cannot be read back. Recovered as "no prior state". */
export class StateLoadError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("state_load", message, options);
  }
}

/** Persisted state could not be written. Fatal for the run. */
export class StateSaveError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("state_save", message, options);
  }
}

/** Push endpoint unreachable or rejecting after every retry. */
export class DeliveryError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super("delivery", message, options);
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
