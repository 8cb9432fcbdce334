/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * import { errorHandler, loggerMiddleware, validate } from '@/api/middleware';
 * ```
 */

// Error handling
export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  DOMAIN_ERROR_STATUS,
  type ErrorCode,
} from './error-handler';

// Request logging
export { loggerMiddleware, type RequestLoggerOptions } from './logger';

// Request body validation
export { validate, toValidationDetails, type ValidatedBodyEnv } from './validate';
