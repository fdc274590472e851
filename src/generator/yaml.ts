/**
 * YAML Serializer - Block-style YAML for generated documents
 *
 * Covers the JSON value space (objects, arrays, strings, numbers,
 * booleans, null). Strings that could read as another type or carry
 * YAML syntax are written double-quoted.
 *
 * @module generator/yaml
 * @category Generator
 */

/** Strings that can be written without quotes. */
const PLAIN_STRING = /^[A-Za-z_/][\w ./{}()-]*$/;

/** Plain scalars YAML would read as booleans or null. */
const RESERVED_WORDS = /^(true|false|null|yes|no|on|off|y|n|~)$/i;

/**
 * Serialize a JSON-compatible value to YAML.
 *
 * Undefined object members are skipped, as in JSON.stringify.
 *
 * @example
 * ```typescript
 * toYAML({ openapi: '3.0.0', tags: [{ name: 'posts' }] });
 * // openapi: "3.0.0"
 * // tags:
 * //   - name: posts
 * ```
 */
export function toYAML(value: unknown, indent = 0): string {
  const spaces = '  '.repeat(indent);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    return value
      .map((item) => `${spaces}- ${toYAML(item, indent + 1).trimStart()}`)
      .join('\n');
  }

  if (isRecord(value)) {
    const entries = definedEntries(value);
    if (entries.length === 0) return '{}';
    return entries
      .map(([key, item]) => {
        const separator = isBlock(item) ? '\n' : ' ';
        return `${spaces}${formatScalar(key)}:${separator}${toYAML(item, indent + 1)}`;
      })
      .join('\n');
  }

  return formatScalar(value);
}

function formatScalar(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    if (PLAIN_STRING.test(value) && !RESERVED_WORDS.test(value) && !value.endsWith(' ')) {
      return value;
    }
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  return JSON.stringify(String(value));
}

/**
 * Whether a value is written on the lines below its key.
 */
function isBlock(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return isRecord(value) && definedEntries(value).length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function definedEntries(value: Record<string, unknown>): Array<[string, unknown]> {
  return Object.entries(value).filter(([, item]) => item !== undefined);
}
