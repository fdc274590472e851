/**
 * Schema - The post shape and its payload validation
 *
 * @module schema
 * @category Schema
 */

export {
  postFields,
  POST_INPUT_FIELDS,
  MAX_POST_ID,
  serializePost,
} from './post';
export type { Post, PostInput, FieldType, FieldDefinition } from './post';

export { checkPost, validatePost, renderValue } from './validator';
export type { ValidationResult } from './validator';
