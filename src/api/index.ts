/**
 * API Module - Barrel Export
 *
 * The server entry point (server.ts) is not exported: importing it starts
 * listening.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(services, config);
 * const res = await app.request('/api/clock');
 * ```
 */

export { createApp, type AppDependencies } from './app';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  DOMAIN_ERROR_STATUS,
  loggerMiddleware,
  validate,
  type ErrorCode,
  type RequestLoggerOptions,
} from './middleware';

export {
  createApiRouter,
  healthRoutes,
  decksRoutes,
  clockRoutes,
  sessionRoutes,
  type ApiInfo,
  type HealthCheckData,
} from './routes';

export { success, error } from './utils/response';

export type {
  ApiResponse,
  ApiError,
  ApiErrorResponse,
  ValidationErrorDetail,
} from './types';
