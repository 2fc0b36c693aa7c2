/**
 * CRM Sync Errors
 *
 * Error hierarchy raised by the CRM clients and the sync services, and the
 * classifier that maps any thrown value onto a stable code.
 *
 * @module errors
 */

import type { CRMSystem } from '@meetsync/lib';

// ===========================================
// Error Codes
// ===========================================

export const ErrorCodes = {
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  API_ERROR: 'API_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
  NETWORK_ERROR: 'NETWORK_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ===========================================
// CRM Errors
// ===========================================

/**
 * Base class for failures talking to a CRM.
 */
export class CRMError extends Error {
  readonly code: ErrorCode;
  readonly system?: CRMSystem;

  constructor(message: string, code: ErrorCode, system?: CRMSystem) {
    super(message);
    this.name = 'CRMError';
    this.code = code;
    this.system = system;
  }
}

/** Token exchange failed, credentials missing, or a refreshed token was still rejected */
export class CRMAuthenticationError extends CRMError {
  constructor(message: string, system?: CRMSystem) {
    super(message, ErrorCodes.AUTHENTICATION_FAILED, system);
    this.name = 'CRMAuthenticationError';
  }
}

/** The CRM kept failing after every retry */
export class CRMAPIError extends CRMError {
  readonly status?: number;
  readonly responseBody?: string;

  constructor(
    message: string,
    options: { system?: CRMSystem; status?: number; responseBody?: string } = {}
  ) {
    super(message, ErrorCodes.API_ERROR, options.system);
    this.name = 'CRMAPIError';
    this.status = options.status;
    this.responseBody = options.responseBody;
  }
}

/** The CRM kept answering 429 */
export class CRMRateLimitError extends CRMError {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, system?: CRMSystem) {
    super(message, ErrorCodes.RATE_LIMITED, system);
    this.name = 'CRMRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

// ===========================================
// Business Errors
// ===========================================

export type SyncValidationCode =
  | typeof ErrorCodes.VALIDATION_FAILED
  | typeof ErrorCodes.NOT_FOUND
  | typeof ErrorCodes.INVALID_STATE;

/**
 * A request that can never succeed as issued: unknown session or record,
 * missing CRM id, wrong lifecycle state. Not retried.
 */
export class SyncValidationError extends Error {
  readonly code: SyncValidationCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: SyncValidationCode = ErrorCodes.VALIDATION_FAILED, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncValidationError';
    this.code = code;
    this.details = details;
  }
}

export function notFound(resource: string, id: string): SyncValidationError {
  return new SyncValidationError(`${resource} ${id} not found`, ErrorCodes.NOT_FOUND);
}

export function invalidState(message: string, details?: Record<string, unknown>): SyncValidationError {
  return new SyncValidationError(message, ErrorCodes.INVALID_STATE, details);
}

// ===========================================
// Classification
// ===========================================

export interface ClassifiedError {
  code: ErrorCode;
  message: string;
  /** Error class name, kept in sync results */
  errorType: string;
  isRetryable: boolean;
  retryAfterMs?: number;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Classify a thrown value into a code with retry guidance.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = getErrorMessage(error);
  const errorType = error instanceof Error ? error.name : typeof error;

  if (error instanceof CRMRateLimitError) {
    return { code: error.code, message, errorType, isRetryable: true, retryAfterMs: error.retryAfterMs };
  }

  if (error instanceof CRMAuthenticationError) {
    return { code: error.code, message, errorType, isRetryable: false };
  }

  if (error instanceof CRMAPIError) {
    // 4xx other than 408/429 will fail the same way next time
    const clientError =
      error.status !== undefined && error.status >= 400 && error.status < 500 && error.status !== 408;
    return { code: error.code, message, errorType, isRetryable: !clientError };
  }

  if (error instanceof SyncValidationError) {
    return { code: error.code, message, errorType, isRetryable: false };
  }

  if (error instanceof TypeError && /fetch|network|ECONN|ETIMEDOUT/i.test(message)) {
    return { code: ErrorCodes.NETWORK_ERROR, message, errorType, isRetryable: true };
  }

  return { code: ErrorCodes.INTERNAL_ERROR, message, errorType, isRetryable: false };
}
