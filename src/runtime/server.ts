/**
 * HTTP Server - Serve the post handlers over the network
 *
 * Mounts the MSW handlers on an Express app through
 * `@mswjs/http-middleware`. No body parser runs ahead of it: the
 * request stream reaches the handlers untouched, so negotiation and
 * JSON parsing stay in the handler chain. Routes are relative to the
 * server's own origin, and requests no handler matches fall through to
 * a JSON 404.
 *
 * @module runtime/server
 * @category Runtime
 */

import type { Server } from 'node:http';
import { createMiddleware } from '@mswjs/http-middleware';
import express, { type ErrorRequestHandler, type Express } from 'express';
import type { ServerConfig } from '../config';
import { errorResponseBody } from '../middleware/errors';
import { createStorageDriver, type StorageDriver } from '../storage';
import { createHandlers, type HandlerOptions } from './handlers';
import { seedPosts } from './seed';

/**
 * A running HTTP server.
 */
export interface ServerHandle {
  /** Base URL the server listens on */
  url: string;
  /** The storage driver behind the handlers */
  store: StorageDriver;
  /** Stop accepting connections and close the storage driver */
  close(): Promise<void>;
}

/**
 * Create the Express app serving the post handlers.
 *
 * @example
 * ```typescript
 * const app = createApp(store, { apiPrefix: '/api' });
 * app.listen(3000);
 * ```
 */
export function createApp(store: StorageDriver, options?: HandlerOptions): Express {
  const app = express();

  app.use(createMiddleware(...createHandlers(store, { ...options, origin: '' })));

  app.use((_req, res) => {
    res.status(404).json(errorResponseBody('Not found'));
  });
  app.use(bodyErrorHandler);

  return app;
}

/**
 * Answer errors raised outside the handler chain (aborted or unreadable
 * request streams) in JSON.
 */
const bodyErrorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  const status = errorStatus(error);
  const message = status < 500 ? 'Request could not be read' : 'Internal server error';

  res.status(status).json(errorResponseBody(message));
};

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

/**
 * Open storage, optionally seed it, and start listening.
 *
 * @example
 * ```typescript
 * const server = await startServer(loadConfig());
 * console.log(`Listening on ${server.url}`);
 * // later
 * await server.close();
 * ```
 */
export async function startServer(config: ServerConfig): Promise<ServerHandle> {
  const store = createStorageDriver(config.storage, { dataDir: config.dataDir });
  await store.initialize();

  if (config.seed > 0) {
    await seedPosts(store, config.seed);
  }

  const app = createApp(store, {
    apiPrefix: config.apiPrefix,
    quiet: config.logLevel === 'silent',
    logger: config.logLevel === 'silent' ? undefined : { level: config.logLevel },
  });

  const server = await listen(app, config.port, config.host);
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  return {
    url: `http://${config.host}:${port}${config.apiPrefix}`,
    store,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await store.close();
    },
  };
}

/**
 * Start listening, resolving once the socket is bound.
 */
function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });
}
