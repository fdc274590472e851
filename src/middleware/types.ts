/**
 * Middleware Types - Interfaces for the request middleware chain
 *
 * @module middleware/types
 * @category Middleware
 */

/**
 * Result returned by middleware hooks.
 */
export interface MiddlewareResult {
  /** Whether to continue to the next middleware */
  continue: boolean;
  /** Response to send instead (for short-circuiting) */
  response?: Response;
  /** Error to raise instead */
  error?: Error;
}

/**
 * Middleware interface with before/after/onError hooks.
 *
 * @example
 * ```typescript
 * const timing: Middleware = {
 *   name: 'timing',
 *   after: async (ctx, response) => {
 *     response.headers.set('Server-Timing', `total;dur=${Date.now() - (ctx.startTime ?? 0)}`);
 *     return response;
 *   },
 * };
 * ```
 */
export interface Middleware {
  /** Unique name for this middleware */
  name: string;

  /**
   * Called before the handler runs.
   * Can short-circuit with a response or an error.
   */
  before?: (ctx: MiddlewareContext) => Promise<MiddlewareResult | void>;

  /**
   * Called with the response on its way out, in reverse order.
   * Runs for every middleware whose `before` stage was reached.
   */
  after?: (ctx: MiddlewareContext, response: Response) => Promise<Response>;

  /**
   * Called when a `before` hook or the handler throws.
   * Can turn the error into a response, replace it, or let it pass.
   */
  onError?: (ctx: MiddlewareContext, error: Error) => Promise<MiddlewareResult | void>;

  /** Whether this middleware is enabled */
  enabled?: boolean;
}

/**
 * Context passed through the chain for one request.
 */
export interface MiddlewareContext {
  /** The incoming request */
  request: Request;
  /** The operation being performed (list, get, create, delete) */
  operation: string;
  /** Route path parameters */
  params: Record<string, string>;
  /** Start time of the request (milliseconds) */
  startTime?: number;
  /** Request metadata added by middleware */
  metadata: Record<string, unknown>;
}
