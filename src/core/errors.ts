/**
 * Error taxonomy for ingest, configuration and aggregation.
 * Messages follow the `code: detail` convention used in logs.
 */

export type ErrorCode =
  | 'ingest_invalid_table'
  | 'ingest_unavailable'
  | 'config_invalid_json'
  | 'config_invalid_schema'
  | 'config_invalid_env'
  | 'empty_input';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = 'AppError';
    this.code = code;
  }
}

/** Top-level input that is not a table at all. Always fatal for the batch. */
export class IngestError extends AppError {
  constructor(code: 'ingest_invalid_table' | 'ingest_unavailable', detail: string, options?: { cause?: unknown }) {
    super(code, detail, options);
    this.name = 'IngestError';
  }
}

export class ConfigError extends AppError {
  constructor(
    code: 'config_invalid_json' | 'config_invalid_schema' | 'config_invalid_env',
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(code, detail, options);
    this.name = 'ConfigError';
  }
}

export class EmptyInputError extends AppError {
  constructor(operation: string) {
    super('empty_input', `${operation} requires at least one record`);
    this.name = 'EmptyInputError';
  }
}

export function isEmptyInputError(error: unknown): error is EmptyInputError {
  return error instanceof EmptyInputError;
}
