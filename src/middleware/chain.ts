/**
 * MiddlewareChain - Executor for composable request middleware
 *
 * Chains middleware in order, executing before hooks, the handler,
 * and after hooks in sequence.
 *
 * @module middleware/chain
 * @category Middleware
 */

import type { Middleware, MiddlewareContext } from './types';

/**
 * MiddlewareChain class for executing middleware in sequence.
 *
 * `before` hooks run in order and may short-circuit. Errors thrown by a
 * `before` hook or the handler go through every `onError` hook until one
 * produces a response. `after` hooks run in reverse order for each
 * middleware whose `before` stage was reached, including on
 * short-circuited and error responses.
 *
 * @example
 * ```typescript
 * const chain = new MiddlewareChain([
 *   createLoggerMiddleware(),
 *   createErrorMiddleware(),
 *   createNegotiationMiddleware(),
 * ]);
 *
 * const response = await chain.execute(ctx, () => listPosts(store, ctx.request));
 * ```
 */
export class MiddlewareChain {
  /** The middleware stack */
  private middlewares: Middleware[];

  /**
   * Create a new MiddlewareChain.
   *
   * @param middlewares - Array of middleware to execute in order
   */
  constructor(middlewares: Middleware[]) {
    this.middlewares = middlewares.filter((m) => m.enabled !== false);
  }

  /**
   * Execute the middleware chain with the given handler.
   *
   * @param ctx - The middleware context
   * @param handler - The final handler producing the response
   * @returns The response after all middleware processing
   * @throws The handler's error when no onError hook turns it into a response
   */
  async execute(ctx: MiddlewareContext, handler: () => Promise<Response>): Promise<Response> {
    // Set start time for timing middleware
    ctx.startTime = Date.now();
    ctx.metadata = ctx.metadata ?? {};

    const entered: Middleware[] = [];
    let response: Response;

    try {
      response = (await this.runBefore(ctx, entered)) ?? (await handler());
    } catch (error) {
      response = await this.runOnError(ctx, error instanceof Error ? error : new Error(String(error)));
    }

    // Execute 'after' hooks in reverse order
    for (let i = entered.length - 1; i >= 0; i--) {
      const middleware = entered[i];
      if (middleware.after) {
        response = await middleware.after(ctx, response);
      }
    }

    return response;
  }

  /**
   * Execute 'before' hooks, recording each middleware reached.
   *
   * @returns A short-circuit response, or null to run the handler
   */
  private async runBefore(ctx: MiddlewareContext, entered: Middleware[]): Promise<Response | null> {
    for (const middleware of this.middlewares) {
      entered.push(middleware);
      if (middleware.before) {
        const result = await middleware.before(ctx);
        if (result && !result.continue) {
          if (result.response) {
            return result.response;
          }
          if (result.error) {
            throw result.error;
          }
        }
      }
    }
    return null;
  }

  /**
   * Execute 'onError' hooks until one yields a response.
   */
  private async runOnError(ctx: MiddlewareContext, error: Error): Promise<Response> {
    let current = error;

    for (const middleware of this.middlewares) {
      if (middleware.onError) {
        const result = await middleware.onError(ctx, current);
        if (result && !result.continue) {
          if (result.response) {
            return result.response;
          }
          if (result.error) {
            current = result.error;
          }
        }
      }
    }

    // Re-throw if not handled
    throw current;
  }

  /**
   * Add middleware to the chain.
   *
   * @param middleware - Middleware to add
   */
  use(middleware: Middleware): this {
    if (middleware.enabled !== false) {
      this.middlewares.push(middleware);
    }
    return this;
  }

  /**
   * Remove middleware by name.
   *
   * @param name - Name of middleware to remove
   */
  remove(name: string): this {
    this.middlewares = this.middlewares.filter((m) => m.name !== name);
    return this;
  }

  /**
   * Get middleware by name.
   */
  get(name: string): Middleware | undefined {
    return this.middlewares.find((m) => m.name === name);
  }

  /**
   * Get all middleware names.
   */
  names(): string[] {
    return this.middlewares.map((m) => m.name);
  }

  /**
   * Get the middleware count.
   */
  get length(): number {
    return this.middlewares.length;
  }
}

/**
 * Create a middleware chain from an array of middleware.
 *
 * @example
 * ```typescript
 * const chain = createMiddlewareChain([createLoggerMiddleware(), createErrorMiddleware()]);
 * ```
 */
export function createMiddlewareChain(middlewares: Middleware[]): MiddlewareChain {
  return new MiddlewareChain(middlewares);
}
