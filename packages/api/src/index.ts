/**
 * Sync API
 *
 * @module api
 */
export { createApp, API_VERSION, type AppOptions, type SyncApiApp } from './app';
export {
  AppError,
  ErrorCodes,
  errorHandler,
  notFoundHandler,
  type ErrorCode,
  type ErrorResponse,
} from './middleware/error-handler';
export { authMiddleware, secureCompare, API_SECRET_HEADER } from './middleware/auth';
export { loggingMiddleware, REQUEST_ID_HEADER } from './middleware/logging';
export * from './contracts';
export type { AppEnv } from './types';
