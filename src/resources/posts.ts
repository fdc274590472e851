/**
 * Post Resource - The four endpoint behaviors
 *
 * Each function is the body of one route, run after the negotiation
 * middleware has passed. Failures are thrown as ApiErrors and turned
 * into responses by the error middleware.
 *
 * @module resources/posts
 * @category Resources
 */

import { HttpResponse } from 'msw';
import { NotFoundError, ValidationError } from '../errors';
import { parsePostFilter } from '../query/filter';
import { MAX_POST_ID, serializePost } from '../schema/post';
import { validatePost } from '../schema/validator';
import type { StorageDriver } from '../storage/types';

/**
 * Builds the URL path of a single post, for the Location header.
 */
export type PostLocation = (id: number) => string;

/**
 * List posts - `GET /posts[?title_like=&body_like=]`
 *
 * @returns 200 with the matching posts, id ascending
 */
export async function listPosts(store: StorageDriver, request: Request): Promise<Response> {
  const filter = parsePostFilter(new URL(request.url).searchParams);
  const posts = await store.list(filter);
  return HttpResponse.json(posts.map(serializePost));
}

/**
 * Get one post - `GET /posts/:id`
 *
 * @returns 200 with the post
 * @throws {NotFoundError} No post has this id
 */
export async function getPost(store: StorageDriver, rawId: string): Promise<Response> {
  const id = parsePostId(rawId);
  const post = await store.get(id);

  if (!post) {
    throw new NotFoundError(id);
  }

  return HttpResponse.json(serializePost(post));
}

/**
 * Create a post - `POST /posts`
 *
 * @returns 201 with the stored post and a Location header
 * @throws {ValidationError} The body is not JSON or not a valid post
 */
export async function createPost(
  store: StorageDriver,
  request: Request,
  location: PostLocation
): Promise<Response> {
  const payload = await readJsonBody(request);
  const input = validatePost(payload);
  const post = await store.insert(input);

  return HttpResponse.json(serializePost(post), {
    status: 201,
    headers: { Location: location(post.id) },
  });
}

/**
 * Delete a post - `DELETE /posts/:id`
 *
 * @returns 200 with a confirmation message
 * @throws {NotFoundError} No post has this id
 */
export async function deletePost(store: StorageDriver, rawId: string): Promise<Response> {
  const id = parsePostId(rawId);
  const deleted = await store.delete(id);

  if (!deleted) {
    throw new NotFoundError(id);
  }

  return HttpResponse.json({ message: `Deleted post with id ${id}` });
}

/**
 * Parse an id path segment. Anything that cannot be a stored id is
 * reported as a missing post, echoing the segment as given.
 *
 * @throws {NotFoundError}
 */
export function parsePostId(rawId: string): number {
  if (!/^\d+$/.test(rawId)) {
    throw new NotFoundError(rawId);
  }

  const id = Number(rawId);
  if (id > MAX_POST_ID) {
    throw new NotFoundError(rawId);
  }

  return id;
}

/**
 * Read and parse a JSON request body.
 *
 * @throws {ValidationError} The body is not valid JSON
 */
async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();

  try {
    const payload: unknown = JSON.parse(text);
    return payload;
  } catch {
    throw new ValidationError('Request body is not valid JSON');
  }
}
