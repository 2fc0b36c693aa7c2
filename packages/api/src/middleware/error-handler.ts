/**
 * Error handling for the sync API
 * Maps thrown errors onto structured JSON responses with proper HTTP status codes
 */
import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { isoNow, systemClock, type Clock } from '@meetsync/lib';
import {
  CRMError,
  CRMRateLimitError,
  ErrorCodes as SyncErrorCodes,
  SyncValidationError,
  getLogger,
  type SyncLogger,
} from '@meetsync/crm-sync';
import type { AppEnv } from '../types';

// Error codes for client consumption
export const ErrorCodes = {
  // Client errors (4xx)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  AUTHORIZATION_ERROR: 'AUTHORIZATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  RATE_LIMITED: 'RATE_LIMITED',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  CRM_ERROR: 'CRM_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Structured error response
export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

// Custom application error
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public status: ContentfulStatusCode = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCodes.VALIDATION_ERROR, 400, details);
}

export function notFoundError(resource: string): AppError {
  return new AppError(`${resource} not found`, ErrorCodes.NOT_FOUND, 404);
}

/**
 * Format Zod validation errors into a field -> messages map
 */
function formatZodError(error: ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'root';
    (formatted[key] ??= []).push(issue.message);
  }

  return formatted;
}

/**
 * Request validation hook for `zValidator`: failures are thrown so they
 * reach the error handler and share its envelope.
 */
export function throwOnInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    throw result.error;
  }
}

interface MappedError {
  status: ContentfulStatusCode;
  message: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
}

const SYNC_VALIDATION_STATUS = {
  [SyncErrorCodes.VALIDATION_FAILED]: { status: 400, code: ErrorCodes.VALIDATION_ERROR },
  [SyncErrorCodes.NOT_FOUND]: { status: 404, code: ErrorCodes.NOT_FOUND },
  [SyncErrorCodes.INVALID_STATE]: { status: 409, code: ErrorCodes.CONFLICT },
} as const satisfies Record<SyncValidationError['code'], { status: ContentfulStatusCode; code: ErrorCode }>;

function httpExceptionCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCodes.VALIDATION_ERROR;
    case 401:
      return ErrorCodes.AUTHENTICATION_ERROR;
    case 403:
      return ErrorCodes.AUTHORIZATION_ERROR;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 429:
      return ErrorCodes.RATE_LIMITED;
    default:
      return ErrorCodes.INTERNAL_ERROR;
  }
}

function mapError(err: unknown, isDev: boolean): MappedError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      message: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: { fields: formatZodError(err) },
    };
  }

  if (err instanceof SyncValidationError) {
    const mapped = SYNC_VALIDATION_STATUS[err.code];
    return { status: mapped.status, message: err.message, code: mapped.code, details: err.details };
  }

  if (err instanceof AppError) {
    return { status: err.status, message: err.message, code: err.code, details: err.details };
  }

  if (err instanceof HTTPException) {
    return { status: err.status, message: err.message || 'HTTP error', code: httpExceptionCode(err.status) };
  }

  if (err instanceof CRMRateLimitError) {
    return {
      status: 429,
      message: err.message,
      code: ErrorCodes.RATE_LIMITED,
      details: { crm_system: err.system, retry_after_ms: err.retryAfterMs },
    };
  }

  if (err instanceof CRMError) {
    return { status: 502, message: err.message, code: ErrorCodes.CRM_ERROR, details: { crm_system: err.system } };
  }

  // Don't expose internal error details in production
  const message = isDev && err instanceof Error ? err.message : 'Internal server error';
  const details = isDev && err instanceof Error ? { stack: err.stack } : undefined;
  return { status: 500, message, code: ErrorCodes.INTERNAL_ERROR, details };
}

export interface ErrorHandlerOptions {
  environment?: string;
  clock?: Clock;
  logger?: SyncLogger;
}

function respond(c: Context<AppEnv>, mapped: MappedError, clock: Clock): Response {
  const body: ErrorResponse = {
    success: false,
    error: mapped.message,
    code: mapped.code,
    details: mapped.details,
    timestamp: isoNow(clock),
    requestId: c.get('requestId'),
  };
  return c.json(body, mapped.status);
}

/**
 * Error handler for `app.onError`
 */
export function errorHandler(options: ErrorHandlerOptions = {}): ErrorHandler<AppEnv> {
  const clock = options.clock ?? systemClock;
  const isDev = options.environment === 'development';

  return (err, c) => {
    const mapped = mapError(err, isDev);

    if (mapped.status >= 500) {
      const logger = options.logger ?? getLogger();
      logger.error('request_error', err, {
        method: c.req.method,
        path: c.req.path,
        request_id: c.get('requestId'),
        status: mapped.status,
      });
    }

    return respond(c, mapped, clock);
  };
}

/**
 * Handler for `app.notFound`
 */
export function notFoundHandler(options: Pick<ErrorHandlerOptions, 'clock'> = {}): NotFoundHandler<AppEnv> {
  const clock = options.clock ?? systemClock;
  return (c) => respond(c, { status: 404, message: 'Not found', code: ErrorCodes.NOT_FOUND }, clock);
}
