export type ErrorKind = "config" | "exchange" | "analysis" | "delivery" | "storage";

/**
 * Base class for every failure the advisor reports on purpose.
 * `kind` names the failure domain so callers can branch without instanceof chains.
 */
export class AdvisorError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export class ExchangeError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("exchange", message, options);
  }
}

export class AnalysisError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis", message, options);
  }
}

export class DeliveryError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("delivery", message, options);
  }
}

export class StorageError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("storage", message, options);
  }
}

export type Result<T, E extends AdvisorError = AdvisorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E extends AdvisorError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps anything thrown into an AdvisorError, keeping existing ones as they are.
 */
export function toAdvisorError(error: unknown, kind: ErrorKind): AdvisorError {
  if (error instanceof AdvisorError) return error;
  return new AdvisorError(kind, errorMessage(error), { cause: error });
}
