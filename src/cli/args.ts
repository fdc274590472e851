/**
 * CLI Arguments - Command-line parsing for posts-api
 *
 * @module cli/args
 * @category CLI
 */

/**
 * Options accepted on the command line. Values stay strings; the
 * commands validate them (serve through loadConfig).
 */
export interface CLIOptions {
  // serve
  port?: string;
  host?: string;
  prefix?: string;
  driver?: string;
  dataDir?: string;
  seed?: string;
  logLevel?: string;
  // seed
  count?: string;
  fakerSeed?: string;
  // generate:openapi
  output?: string;
  format?: string;
  serverUrl?: string;
}

/**
 * Result of parsing argv.
 */
export interface ParsedArgs {
  command: string;
  options: CLIOptions;
  positional: string[];
}

/**
 * Flags that take a value, with their short aliases.
 */
const VALUE_FLAGS: Partial<Record<string, keyof CLIOptions>> = {
  '--port': 'port',
  '-p': 'port',
  '--host': 'host',
  '--prefix': 'prefix',
  '--driver': 'driver',
  '--data-dir': 'dataDir',
  '--seed': 'seed',
  '--log-level': 'logLevel',
  '--count': 'count',
  '-n': 'count',
  '--faker-seed': 'fakerSeed',
  '--output': 'output',
  '-o': 'output',
  '--format': 'format',
  '-f': 'format',
  '--server-url': 'serverUrl',
};

/**
 * Parse command line arguments.
 *
 * The first bare word is the command. Flags take their value from the
 * next argument or after `=` (`--port=8080`).
 *
 * @throws Error on an unknown flag or a flag missing its value
 *
 * @example
 * ```typescript
 * parseArgs(['serve', '--port', '8080', '--driver=pglite']);
 * // { command: 'serve', options: { port: '8080', driver: 'pglite' }, positional: [] }
 * ```
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: CLIOptions = {};
  const positional: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('-')) {
      if (!command) {
        command = arg;
      } else {
        positional.push(arg);
      }
      continue;
    }

    // Help and version flags double as commands
    if (!command && ['--help', '-h', '--version', '-v'].includes(arg)) {
      command = arg;
      continue;
    }

    const [flag, inline] = splitInline(arg);
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new Error(`Unknown option: ${flag}`);
    }

    const value = inline ?? args[++i];
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }
    options[key] = value;
  }

  return { command, options, positional };
}

/**
 * Split `--flag=value` into its parts.
 */
function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (eq === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}
