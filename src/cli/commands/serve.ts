/**
 * Serve command - Run the posts API over HTTP
 *
 * @module cli/commands/serve
 * @category CLI
 */

import { loadConfig } from '../../config';
import { startServer, type ServerHandle } from '../../runtime/server';
import type { CLIOptions } from '../args';

/**
 * Start the server from environment variables and CLI flags.
 * Flags win over the environment.
 *
 * @param env - Environment to read (default: process.env)
 */
export async function serve(
  options: CLIOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ServerHandle> {
  const config = loadConfig(env, {
    port: options.port,
    host: options.host,
    apiPrefix: options.prefix,
    storage: options.driver,
    dataDir: options.dataDir,
    seed: options.seed,
    logLevel: options.logLevel,
  });

  const server = await startServer(config);

  if (config.logLevel !== 'silent') {
    const location = config.dataDir ? `, ${config.dataDir}` : '';
    console.log(`\n✓ Posts API listening on ${server.url}`);
    console.log(`   Storage: ${server.store.name}${location}`);
    if (config.seed > 0) {
      console.log(`   Seeded: ${config.seed} posts`);
    }
    console.log('');
  }

  return server;
}
