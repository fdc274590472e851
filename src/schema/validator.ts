/**
 * Post Validator - Ordered rule evaluation for create payloads
 *
 * Each writable field is checked in declaration order, running its
 * rules (presence, type, length) in sequence. Evaluation stops at the
 * first failing rule and reports that single message, so a bad title
 * is reported ahead of a missing body.
 *
 * @module schema/validator
 * @category Schema
 *
 * @example
 * ```typescript
 * const result = checkPost({ title: 'Example Post', body: 32 });
 * // { valid: false, field: 'body', message: "32 is not of type 'string'" }
 * ```
 */

import { ValidationError } from '../errors';
import { postFields, POST_INPUT_FIELDS, type FieldDefinition, type PostInput } from './post';

/**
 * Outcome of validating a payload.
 */
export type ValidationResult =
  | { valid: true; value: PostInput }
  | { valid: false; message: string; field?: string };

/**
 * A single check on one field. Returns the failure message, or null to
 * continue with the next rule.
 */
type FieldRule = (
  name: string,
  payload: Record<string, unknown>,
  definition: FieldDefinition
) => string | null;

const requiredRule: FieldRule = (name, payload, definition) => {
  if (definition.required && !Object.prototype.hasOwnProperty.call(payload, name)) {
    return `'${name}' is a required property`;
  }
  return null;
};

const typeRule: FieldRule = (name, payload, definition) => {
  const value = payload[name];
  if (!matchesType(value, definition.type)) {
    return `${renderValue(value)} is not of type '${typeName(definition.type)}'`;
  }
  return null;
};

const minLengthRule: FieldRule = (name, payload, definition) => {
  const value = payload[name];
  const minLength = definition.constraints?.minLength;
  if (minLength !== undefined && typeof value === 'string' && value.length < minLength) {
    return `${renderValue(value)} is too short`;
  }
  return null;
};

/** Rules run for every present field, in this order. */
const FIELD_RULES: readonly FieldRule[] = [typeRule, minLengthRule];

/**
 * Validate a parsed JSON payload against the post shape.
 *
 * Unknown keys are ignored and dropped from the returned value.
 */
export function checkPost(payload: unknown): ValidationResult {
  if (!isJsonObject(payload)) {
    return { valid: false, message: `${renderValue(payload)} is not of type 'object'` };
  }

  const values: Record<string, string> = {};

  for (const name of POST_INPUT_FIELDS) {
    const definition: FieldDefinition = postFields[name];

    const missing = requiredRule(name, payload, definition);
    if (missing) {
      return { valid: false, message: missing, field: name };
    }
    if (!Object.prototype.hasOwnProperty.call(payload, name)) {
      continue;
    }

    for (const rule of FIELD_RULES) {
      const message = rule(name, payload, definition);
      if (message) {
        return { valid: false, message, field: name };
      }
    }

    const value = payload[name];
    if (typeof value === 'string') {
      values[name] = value;
    }
  }

  return { valid: true, value: { title: values.title, body: values.body } };
}

/**
 * Validate a payload, throwing a ValidationError on the first failure.
 *
 * @returns The payload reduced to the writable post fields
 * @throws {ValidationError}
 */
export function validatePost(payload: unknown): PostInput {
  const result = checkPost(payload);
  if (!result.valid) {
    throw new ValidationError(result.message, result.field);
  }
  return result.value;
}

const STRING_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Render a payload value for an error message. Strings are quoted with
 * single quotes, or double quotes when they hold a single quote and no
 * double quote; everything else is JSON text.
 */
export function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
    const escaped = value.replace(/[\\\n\r\t]/g, (char) => STRING_ESCAPES[char] ?? char);
    return quote + escaped.split(quote).join(`\\${quote}`) + quote;
  }
  return JSON.stringify(value);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matchesType(value: unknown, type: FieldDefinition['type']): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'int':
      return Number.isInteger(value);
  }
}

function typeName(type: FieldDefinition['type']): string {
  return type === 'int' ? 'integer' : type;
}
