/**
 * Post Schema - The one resource shape served by the API
 *
 * Field declarations drive both payload validation and the relational
 * table layout, so the declaration order here is the order in which
 * payload rules are evaluated.
 *
 * @module schema/post
 * @category Schema
 */

/**
 * A stored post.
 */
export interface Post {
  /** Assigned by the storage driver on creation, never changed */
  id: number;
  title: string;
  body: string;
}

/**
 * The client-supplied part of a post.
 */
export type PostInput = Omit<Post, 'id'>;

/**
 * Primitive types a payload field may declare.
 */
export type FieldType = 'string' | 'int';

/**
 * Declaration of a single post field.
 */
export interface FieldDefinition {
  type: FieldType;
  /** Must be present in a create payload */
  required?: boolean;
  /** Assigned by storage, never read from a payload */
  readOnly?: boolean;
  constraints?: {
    minLength?: number;
  };
}

/**
 * Field declarations of the post entity, in evaluation order.
 */
export const postFields = {
  id: { type: 'int', readOnly: true },
  title: { type: 'string', required: true, constraints: { minLength: 1 } },
  body: { type: 'string', required: true, constraints: { minLength: 1 } },
} as const satisfies Record<keyof Post, FieldDefinition>;

/**
 * Names of the fields a client writes, in declaration order.
 */
export const POST_INPUT_FIELDS = ['title', 'body'] as const satisfies readonly (keyof PostInput)[];

/**
 * Largest id a post can have (PostgreSQL INTEGER).
 */
export const MAX_POST_ID = 2_147_483_647;

/**
 * Serialize a post with a fixed key order.
 */
export function serializePost(post: Post): Post {
  return { id: post.id, title: post.title, body: post.body };
}
