/**
 * Package version lookup for the CLI
 *
 * @module cli/version
 * @category CLI
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

const FALLBACK_VERSION = '0.1.0';

/**
 * Read the package version. The package root is two directories up
 * from both src/cli and dist/cli.
 */
export function readPackageVersion(): string {
  const pkgPath = resolve(__dirname, '../../package.json');
  if (!existsSync(pkgPath)) {
    return FALLBACK_VERSION;
  }

  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return FALLBACK_VERSION;
}
