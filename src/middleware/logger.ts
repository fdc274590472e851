/**
 * Logger Middleware - One line per request stage
 *
 * Requests log at `debug` on the way in, responses at `info` on the way
 * out, and thrown errors at `warn` (client errors) or `error` (anything
 * else) as they pass through the chain.
 *
 * @module middleware/logger
 * @category Middleware
 */

import { isApiError } from '../errors';
import type { Middleware, MiddlewareContext } from './types';

/**
 * Log level type.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log line kinds produced by the middleware.
 */
export type LogEvent = 'request' | 'response' | 'error';

/**
 * Configuration options for logger middleware.
 */
export interface LoggerMiddlewareConfig {
  /** Custom log function (default: console.log) */
  log?: (message: string, data?: unknown) => void;
  /** Whether to log requests (default: true) */
  logRequest?: boolean;
  /** Whether to log responses (default: true) */
  logResponse?: boolean;
  /** Whether to log errors (default: true) */
  logErrors?: boolean;
  /** Whether to append durations (default: true) */
  logTiming?: boolean;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Replaces the built-in line format */
  formatter?: (type: LogEvent, ctx: MiddlewareContext, data?: unknown) => string;
  /** Query and path parameter names to redact, matched by substring */
  redactFields?: string[];
}

const DEFAULT_REDACT_FIELDS = ['password', 'token', 'secret', 'apiKey', 'authorization'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LINE_TAG = '[posts-api]';

/**
 * Replace the values of sensitive keys.
 */
function redact(values: Record<string, string>, fields: string[]): Record<string, string> {
  const patterns = fields.map((field) => field.toLowerCase());
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [
      key,
      patterns.some((pattern) => key.toLowerCase().includes(pattern)) ? '[REDACTED]' : value,
    ])
  );
}

/**
 * `METHOD /path` of a request, without the query string.
 */
function target(request: Request): string {
  return `${request.method} ${new URL(request.url).pathname}`;
}

function elapsed(ctx: MiddlewareContext): number | undefined {
  return ctx.startTime ? Date.now() - ctx.startTime : undefined;
}

/**
 * Create a logger middleware.
 *
 * Place it first in the chain so its `after` hook sees the final
 * response, including error responses.
 *
 * @example
 * ```typescript
 * const loggerMiddleware = createLoggerMiddleware({ level: 'debug' });
 * ```
 *
 * @example
 * ```typescript
 * // Collect lines in a test
 * const lines: string[] = [];
 * const loggerMiddleware = createLoggerMiddleware({
 *   log: (msg) => lines.push(msg),
 *   formatter: (type, ctx) => `${type} ${ctx.operation}`,
 * });
 * ```
 */
export function createLoggerMiddleware(config?: LoggerMiddlewareConfig): Middleware {
  const {
    log = console.log.bind(console),
    logRequest = true,
    logResponse = true,
    logErrors = true,
    logTiming = true,
    level = 'info',
    formatter,
    redactFields = DEFAULT_REDACT_FIELDS,
  } = config ?? {};

  const enabled = (lineLevel: LogLevel): boolean => LEVEL_RANK[lineLevel] >= LEVEL_RANK[level];

  function line(type: LogEvent, ctx: MiddlewareContext, data?: unknown): string {
    if (formatter) {
      return formatter(type, ctx, data);
    }

    const head = `[${new Date().toISOString()}] ${LINE_TAG}`;
    if (type === 'request') {
      return `${head} → ${target(ctx.request)}`;
    }
    if (type === 'error') {
      return `${head} ✗ ${target(ctx.request)} ERROR`;
    }

    const status = data instanceof Response ? ` ${data.status}` : '';
    const timing = logTiming ? ` (${elapsed(ctx) ?? 0}ms)` : '';
    return `${head} ← ${target(ctx.request)}${status}${timing}`;
  }

  function withTiming(ctx: MiddlewareContext, data: Record<string, unknown>): Record<string, unknown> {
    const duration = elapsed(ctx);
    return logTiming && duration !== undefined ? { ...data, duration } : data;
  }

  return {
    name: 'logger',

    async before(ctx: MiddlewareContext) {
      if (!logRequest || !enabled('debug')) return;

      const data: Record<string, unknown> = { operation: ctx.operation };
      if (Object.keys(ctx.params).length > 0) {
        data.params = redact(ctx.params, redactFields);
      }
      const query = Object.fromEntries(new URL(ctx.request.url).searchParams);
      if (Object.keys(query).length > 0) {
        data.query = redact(query, redactFields);
      }

      log(line('request', ctx), data);
    },

    async after(ctx: MiddlewareContext, response: Response) {
      if (logResponse && enabled('info')) {
        log(
          line('response', ctx, response),
          withTiming(ctx, { operation: ctx.operation, status: response.status })
        );
      }
      return response;
    },

    async onError(ctx: MiddlewareContext, error: Error) {
      const errorLevel: LogLevel = isApiError(error) && error.status < 500 ? 'warn' : 'error';
      if (logErrors && enabled(errorLevel)) {
        log(
          line('error', ctx, error),
          withTiming(ctx, { operation: ctx.operation, error: error.message })
        );
      }

      // Leave the error to later onError hooks
      return { continue: true };
    },
  };
}

/**
 * Create a logger that writes nothing. Useful for testing.
 */
export function createSilentLogger(): Middleware {
  return createLoggerMiddleware({
    log: () => {},
    logRequest: false,
    logResponse: false,
    logErrors: false,
  });
}
