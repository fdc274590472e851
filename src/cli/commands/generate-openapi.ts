/**
 * Generate OpenAPI command - Write the API document to a file
 *
 * @module cli/commands/generate-openapi
 * @category CLI
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { generateOpenAPI } from '../../generator/openapi';
import { toYAML } from '../../generator/yaml';
import type { CLIOptions } from '../args';
import { readPackageVersion } from '../version';

/**
 * Output formats for the document.
 */
export type OpenAPIFormat = 'json' | 'yaml';

/**
 * Pick the output format: --format when given, otherwise from the
 * file extension.
 */
export function resolveFormat(outputPath: string, format?: string): OpenAPIFormat {
  if (format === undefined) {
    return outputPath.endsWith('.yaml') || outputPath.endsWith('.yml') ? 'yaml' : 'json';
  }
  if (format === 'json' || format === 'yaml') {
    return format;
  }
  throw new Error(`Unknown format '${format}', expected json or yaml`);
}

/**
 * Generate the OpenAPI document and write it to --output.
 *
 * @returns Absolute path of the written file
 */
export async function generateOpenAPIFile(options: CLIOptions): Promise<string> {
  if (!options.output) {
    throw new Error('generate:openapi requires --output <file>');
  }

  const outputPath = resolve(options.output);
  const format = resolveFormat(outputPath, options.format);

  const spec = generateOpenAPI({
    version: readPackageVersion(),
    serverUrl: options.serverUrl,
    basePath: options.prefix,
  });

  const output = format === 'yaml' ? toYAML(spec) : JSON.stringify(spec, null, 2);

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${output}\n`);
  console.log(`  Generated: ${outputPath}`);

  return outputPath;
}
