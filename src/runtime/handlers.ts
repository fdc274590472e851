/**
 * MSW Handlers - HTTP routes for the post resource
 *
 * Binds the post resource functions to MSW request handlers, each
 * wrapped in the middleware chain (logging, error mapping,
 * negotiation). The same handlers serve real HTTP traffic through
 * runtime/server and in-process requests through `msw/node`.
 *
 * @module runtime/handlers
 * @category Runtime
 */

import { http } from 'msw';
import { MethodNotAllowedError } from '../errors';
import { MiddlewareChain } from '../middleware/chain';
import { createErrorMiddleware } from '../middleware/errors';
import { createLoggerMiddleware, type LoggerMiddlewareConfig } from '../middleware/logger';
import { createNegotiationMiddleware, JSON_MIME_TYPE } from '../middleware/negotiate';
import type { Middleware, MiddlewareContext } from '../middleware/types';
import { createPost, deletePost, getPost, listPosts } from '../resources/posts';
import type { StorageDriver } from '../storage/types';

// Use inferred type for MSW handler to avoid DTS resolution issues
type HttpHandler = ReturnType<typeof http.get>;

/**
 * Handler options for customizing routing and logging.
 */
export interface HandlerOptions {
  /**
   * Origin the routes match on (default: '*', any origin).
   * Set an absolute origin such as 'http://localhost:3000' to pin it,
   * or '' for paths relative to the serving host.
   */
  origin?: string;
  /** Path prefix for every route, e.g. '/api' (default: '') */
  apiPrefix?: string;
  /** Disable request logging */
  quiet?: boolean;
  /** Logger options, used unless quiet */
  logger?: LoggerMiddlewareConfig;
  /** Extra middleware, run after negotiation and before the handler */
  middleware?: Middleware[];
}

/**
 * Create MSW REST handlers for the post resource.
 *
 * Generates handlers for:
 * - GET /posts - List posts, optionally filtered
 * - GET /posts/:id - Get a single post
 * - POST /posts - Create a post
 * - DELETE /posts/:id - Delete a post
 * - any other method on those paths - 405
 *
 * @param store - The storage driver every handler reads and writes
 * @param options - Handler configuration options
 * @returns Array of MSW HTTP handlers
 *
 * @example
 * ```typescript
 * import { setupServer } from 'msw/node';
 *
 * const store = new MemoryStorageDriver();
 * await store.initialize();
 *
 * const server = setupServer(...createHandlers(store, { apiPrefix: '/api' }));
 * server.listen();
 * ```
 */
export function createHandlers(store: StorageDriver, options?: HandlerOptions): HttpHandler[] {
  const origin = options?.origin ?? '*';
  const apiPrefix = options?.apiPrefix ?? '';
  const collectionPath = `${origin}${apiPrefix}/posts`;
  const itemPath = `${collectionPath}/:id`;

  const shared: Middleware[] = [];
  if (!options?.quiet) {
    shared.push(createLoggerMiddleware(options?.logger));
  }
  shared.push(createErrorMiddleware());

  const extra = options?.middleware ?? [];
  const readChain = new MiddlewareChain([...shared, createNegotiationMiddleware(), ...extra]);
  const writeChain = new MiddlewareChain([
    ...shared,
    createNegotiationMiddleware({ contentType: JSON_MIME_TYPE }),
    ...extra,
  ]);
  const fallbackChain = new MiddlewareChain(shared);

  const location = (id: number): string => `${apiPrefix}/posts/${id}`;

  return [
    // List handler - GET /posts
    http.get(collectionPath, ({ request }) =>
      readChain.execute(createContext(request, 'list'), () => listPosts(store, request))
    ),

    // Create handler - POST /posts
    http.post(collectionPath, ({ request }) =>
      writeChain.execute(createContext(request, 'create'), () =>
        createPost(store, request, location)
      )
    ),

    // Get handler - GET /posts/:id
    http.get<{ id: string }>(itemPath, ({ request, params }) =>
      readChain.execute(createContext(request, 'get', params), () => getPost(store, params.id))
    ),

    // Delete handler - DELETE /posts/:id
    http.delete<{ id: string }>(itemPath, ({ request, params }) =>
      readChain.execute(createContext(request, 'delete', params), () =>
        deletePost(store, params.id)
      )
    ),

    // Unsupported methods on known paths
    http.all(collectionPath, ({ request }) =>
      fallbackChain.execute(createContext(request, 'unsupported'), async () => {
        throw new MethodNotAllowedError(['GET', 'POST']);
      })
    ),
    http.all<{ id: string }>(itemPath, ({ request, params }) =>
      fallbackChain.execute(createContext(request, 'unsupported', params), async () => {
        throw new MethodNotAllowedError(['GET', 'DELETE']);
      })
    ),
  ];
}

/**
 * Build the middleware context for one request.
 */
function createContext(
  request: Request,
  operation: string,
  params: Record<string, string> = {}
): MiddlewareContext {
  return {
    request,
    operation,
    params: { ...params },
    metadata: {},
  };
}
