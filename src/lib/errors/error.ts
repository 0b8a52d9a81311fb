import type { ErrorCodeType } from '@/lib/errors/error-codes';

/**
 * JSON value type for error context that is written into the module result document.
 */
export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory = 'auth' | 'permission' | 'config' | 'network' | 'not_found' | 'parse' | 'schema' | 'unknown';

export type ErrorDetail = {
  field?: string;
  issue?: string;
  message?: string;
};

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Minimal structural check; codes are not validated here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function toPublicError(err: unknown): AppError {
  if (isAppError(err)) return err;
  return { code: 'INTERNAL_ERROR', category: 'unknown', message: 'Internal error', retryable: false };
}

/** Throwable wrapper so resolver chains can bail out with a fully-formed AppError. */
export class ModuleFailure extends Error {
  readonly error: AppError;

  constructor(error: AppError) {
    super(error.message);
    this.name = 'ModuleFailure';
    this.error = error;
  }
}
