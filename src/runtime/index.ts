/**
 * Runtime - HTTP handlers, server and seeding
 *
 * @module runtime
 * @category Runtime
 */

export { createHandlers } from './handlers';
export type { HandlerOptions } from './handlers';

export { createApp, startServer } from './server';
export type { ServerHandle } from './server';

export { seedPosts, fakePost } from './seed';
export type { SeedOptions } from './seed';
