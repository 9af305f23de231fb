/**
 * Analytics Errors
 *
 * Ingestion failures (schema, empty data) abort the whole pipeline.
 * Insufficient-data failures are scoped to the analyzer that raised them.
 */

export type AnalyticsErrorKind =
  | "SchemaError"
  | "EmptyDatasetError"
  | "InsufficientDataError"
  | "InsufficientPeriodsError"
  | "ConfigError";

export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly kind: AnalyticsErrorKind,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = kind;
  }
}

export class SchemaError extends AnalyticsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "SchemaError", details);
  }
}

export class EmptyDatasetError extends AnalyticsError {
  constructor(message = "Dataset has no rows after parsing") {
    super(message, "EmptyDatasetError");
  }
}

export class InsufficientDataError extends AnalyticsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "InsufficientDataError", details);
  }
}

export class InsufficientPeriodsError extends AnalyticsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "InsufficientPeriodsError", details);
  }
}

export class ConfigError extends AnalyticsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "ConfigError", details);
  }
}

export interface AnalyzerFailure {
  kind: AnalyticsErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export type AnalyzerResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: AnalyzerFailure };

export function isAnalyticsError(error: unknown): error is AnalyticsError {
  return error instanceof AnalyticsError;
}

export function toFailure(error: AnalyticsError): AnalyzerFailure {
  return {
    kind: error.kind,
    message: error.message,
    ...(error.details ? { details: error.details } : {}),
  };
}

/**
 * Run an analyzer and wrap its outcome. Only AnalyticsErrors become
 * failures; anything else is a bug and propagates.
 */
export function runAnalyzer<T>(name: string, fn: () => T): AnalyzerResult<T> {
  try {
    return { ok: true, data: fn() };
  } catch (error) {
    if (!isAnalyticsError(error)) {
      throw error;
    }
    console.warn(`[Analytics] ${name} unavailable (${error.kind}): ${error.message}`);
    return { ok: false, error: toFailure(error) };
  }
}
