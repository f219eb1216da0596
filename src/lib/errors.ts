export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'VALIDATION_FAILED'
  | 'STORE_UNAVAILABLE'
  | 'MEASUREMENT_FAILED'
  | 'RENDER_FAILED';

/** Base class for every error this project raises on purpose */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, { details });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, { details });
  }
}

/** The point-size database could not be opened, created, read or written. Fatal for a batch. */
export class StoreUnavailableError extends AppError {
  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super('STORE_UNAVAILABLE', message, {
      details: options.path ? { path: options.path } : undefined,
      cause: options.cause,
    });
  }
}

export type MeasurementFailureReason = 'spawn' | 'exit' | 'timeout' | 'parse' | 'aborted';

export interface MeasurementQuery {
  text: string;
  font: string;
  width: number;
  height: number;
}

/** Measuring one caption failed. Fatal for that request only; never cached. */
export class MeasurementError extends AppError {
  readonly reason: MeasurementFailureReason;
  readonly query: MeasurementQuery;

  constructor(
    reason: MeasurementFailureReason,
    query: MeasurementQuery,
    options: { detail?: string; cause?: unknown } = {}
  ) {
    const suffix = options.detail ? `: ${options.detail}` : '';
    super(
      'MEASUREMENT_FAILED',
      `Point size measurement failed (${reason}) for "${query.text}" in ${query.font} at ${query.width}x${query.height}${suffix}`,
      { details: { reason, ...query }, cause: options.cause }
    );
    this.reason = reason;
    this.query = query;
  }
}

export class RenderError extends AppError {
  constructor(message: string, options: { outputPath?: string; cause?: unknown } = {}) {
    super('RENDER_FAILED', message, {
      details: options.outputPath ? { outputPath: options.outputPath } : undefined,
      cause: options.cause,
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
