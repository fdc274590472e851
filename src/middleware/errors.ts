/**
 * Error Middleware - Map thrown errors to JSON responses
 *
 * @module middleware/errors
 * @category Middleware
 */

import { HttpResponse } from 'msw';
import { isApiError, MethodNotAllowedError } from '../errors';
import type { Middleware, MiddlewareContext } from './types';

/**
 * Configuration options for error middleware.
 */
export interface ErrorMiddlewareConfig {
  /** Receives errors that are not ApiErrors (default: console.error) */
  log?: (message: string, error: Error) => void;
}

/**
 * Body shape of every error response.
 */
export interface ErrorBody {
  message: string;
}

/**
 * Build the JSON body every error response carries.
 */
export function errorResponseBody(message: string): ErrorBody {
  return { message };
}

/**
 * Build an error response.
 */
export function errorResponse(status: number, message: string, headers?: HeadersInit): Response {
  return HttpResponse.json(errorResponseBody(message), { status, headers });
}

/**
 * Create an error middleware.
 *
 * ApiErrors become `{ "message": ... }` with their own status. Anything
 * else becomes a 500 with a generic message and is passed to `log`.
 *
 * Register it after the logger so the logger sees the thrown error.
 */
export function createErrorMiddleware(config?: ErrorMiddlewareConfig): Middleware {
  const { log = console.error.bind(console) } = config ?? {};

  return {
    name: 'errors',

    async onError(ctx: MiddlewareContext, error: Error) {
      if (isApiError(error)) {
        const headers =
          error instanceof MethodNotAllowedError ? { Allow: error.allowed.join(', ') } : undefined;
        return { continue: false, response: errorResponse(error.status, error.message, headers) };
      }

      log(`Unhandled error in ${ctx.operation}`, error);
      return { continue: false, response: errorResponse(500, 'Internal server error') };
    },
  };
}
