#!/usr/bin/env node
/**
 * posts-api CLI - Serve, seed and document the posts API
 *
 * @module cli
 * @category CLI
 */

import { parseArgs, type CLIOptions } from './cli/args';
import { generateOpenAPIFile } from './cli/commands/generate-openapi';
import { seed } from './cli/commands/seed';
import { serve } from './cli/commands/serve';
import { readPackageVersion } from './cli/version';

/**
 * Display help information.
 */
function showHelp(): void {
  console.log(`
posts-api - JSON API for creating, listing, reading and deleting posts

Usage:
  posts-api <command> [options]

Commands:
  serve [options]                  Start the HTTP server
  seed --data-dir <dir> [--count <n>]
                                   Insert fake posts into an on-disk database
  generate:openapi --output <file> [--format <json|yaml>]
                                   Generate OpenAPI 3.0 specification
  help                             Show this help message
  version                          Show version

Serve Options:
  --port, -p <port>       Port to listen on (env PORT, default: 3000)
  --host <host>           Host to bind (env HOST, default: 127.0.0.1)
  --prefix <path>         Path prefix for every route, e.g. /api (env API_PREFIX)
  --driver <name>         Storage: memory|pglite (env STORAGE_DRIVER, default: memory)
  --data-dir <dir>        PGlite data directory (env PGLITE_DATA_DIR, default: in-memory)
  --seed <n>              Fake posts to create on start (env SEED_POSTS, default: 0)
  --log-level <level>     debug|info|warn|error|silent (env LOG_LEVEL, default: info)

Seed Options:
  --count, -n <n>         Number of posts (default: 10)
  --faker-seed <n>        Seed for reproducible content

OpenAPI Options:
  --output, -o <file>     Output file
  --format, -f <format>   json or yaml (default: from file extension)
  --prefix <path>         Path prefix to document
  --server-url <url>      Server URL to list in the document

Examples:
  posts-api serve --port 8080
  posts-api serve --driver pglite --data-dir ./data --seed 20
  posts-api seed --data-dir ./data --count 50
  posts-api generate:openapi --output openapi.yaml
`);
}

/**
 * Display version information.
 */
function showVersion(): void {
  console.log(`posts-api v${readPackageVersion()}`);
}

/**
 * Start the server and stop it on SIGINT/SIGTERM.
 */
async function serveCommand(options: CLIOptions): Promise<void> {
  const server = await serve(options);

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`\nReceived ${signal}, shutting down...`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const { command, options } = parseArgs(args);

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
    case '':
      showHelp();
      break;

    case 'version':
    case '--version':
    case '-v':
      showVersion();
      break;

    case 'serve':
      await serveCommand(options);
      break;

    case 'seed':
      await seed(options);
      break;

    case 'generate:openapi':
      await generateOpenAPIFile(options);
      console.log('\n✓ OpenAPI specification generated successfully!\n');
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log('Run "posts-api help" for usage information.');
      process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error('Error:', err.message);
  if (process.env.DEBUG) {
    console.error(err.stack);
  }
  process.exit(1);
});
