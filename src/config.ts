/**
 * Server Configuration - Validated settings for the HTTP server
 *
 * Settings come from defaults, then environment variables, then
 * explicit overrides (CLI flags), and are validated as a whole with a
 * strict zod schema. The result is a plain object handed to
 * startServer(); nothing here is held in module state.
 *
 * @module config
 * @category Configuration
 */

import { z } from 'zod';

/**
 * Log levels accepted by the server; 'silent' disables request logging.
 */
export const CONFIG_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/**
 * Zod schema for the server configuration.
 *
 * Numeric fields are coerced so string values from the environment
 * and the command line validate as numbers.
 */
export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1, 'host is required'),
  apiPrefix: z
    .string()
    .regex(/^(\/[A-Za-z0-9._~-]+)*$/, "apiPrefix must be empty or '/segment' without a trailing slash"),
  storage: z.enum(['memory', 'pglite']),
  dataDir: z.string().min(1).optional(),
  logLevel: z.enum(CONFIG_LOG_LEVELS),
  seed: z.coerce.number().int().min(0),
}).strict();

/**
 * Validated server configuration.
 */
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Values not otherwise supplied, before validation.
 */
export type ConfigOverrides = Partial<Record<keyof ServerConfig, unknown>> & Record<string, unknown>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ServerConfig = {
  port: 3000,
  host: '127.0.0.1',
  apiPrefix: '',
  storage: 'memory',
  logLevel: 'info',
  seed: 0,
};

/**
 * Environment variable read for each setting.
 */
export const CONFIG_ENV_VARS = {
  port: 'PORT',
  host: 'HOST',
  apiPrefix: 'API_PREFIX',
  storage: 'STORAGE_DRIVER',
  dataDir: 'PGLITE_DATA_DIR',
  logLevel: 'LOG_LEVEL',
  seed: 'SEED_POSTS',
} as const satisfies Record<keyof ServerConfig, string>;

/**
 * Collect the settings present in an environment. Empty variables
 * count as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const raw: Record<string, string> = {};

  for (const [key, name] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  return raw;
}

/**
 * Load the server configuration.
 *
 * @param env - Environment to read (default: process.env)
 * @param overrides - Values that win over the environment; undefined entries are ignored
 * @returns Validated configuration
 * @throws Error listing every invalid setting
 *
 * @example
 * ```typescript
 * // Defaults + environment
 * const config = loadConfig();
 *
 * // CLI flags on top
 * const config = loadConfig(process.env, { port: '8080', storage: 'pglite' });
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ServerConfig {
  const provided = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = ServerConfigSchema.safeParse({
    ...DEFAULT_CONFIG,
    ...configFromEnv(env),
    ...provided,
  });

  if (!result.success) {
    const errors = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return `  - ${path ? `${path}: ` : ''}${err.message}`;
    }).join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}
