/**
 * Middleware - Request pipeline stages shared by every route
 *
 * @module middleware
 * @category Middleware
 */

// Re-export types
export type { Middleware, MiddlewareContext, MiddlewareResult } from './types';

// Re-export MiddlewareChain
export { MiddlewareChain, createMiddlewareChain } from './chain';

// Re-export middleware factories
export {
  createNegotiationMiddleware,
  acceptsMimeType,
  hasContentType,
  parseAccept,
  JSON_MIME_TYPE,
} from './negotiate';
export type { NegotiationMiddlewareConfig } from './negotiate';

export { createErrorMiddleware, errorResponse, errorResponseBody } from './errors';
export type { ErrorMiddlewareConfig, ErrorBody } from './errors';

export { createLoggerMiddleware, createSilentLogger } from './logger';
export type { LoggerMiddlewareConfig, LogLevel, LogEvent } from './logger';
