// This module provides a typed application error that the dispatcher maps into JSON-RPC error envelopes.

export type AppErrorCode =
  | 'internal_error'
  | 'invalid_config'
  | 'missing_api_key'
  | 'model_client_init_failed'
  | 'method_not_found'
  | 'invalid_params'
  | 'tool_not_found'
  | 'validation_error'
  | 'upstream_error';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  public constructor(code: AppErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

// Unknown throwables keep their message only; stack traces never reach the wire.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError('internal_error', error.message);
  }

  return new AppError('internal_error', 'An unexpected error occurred.');
}
