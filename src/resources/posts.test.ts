/**
 * Tests for the post resource operations, called without HTTP routing
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, ValidationError } from '../errors';
import { MemoryStorageDriver } from '../storage/drivers/memory';
import { createPost, deletePost, getPost, listPosts, parsePostId } from './posts';

function jsonRequest(body: string): Request {
  return new Request('http://localhost/posts', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('parsePostId', () => {
  it('parses decimal ids', () => {
    expect(parsePostId('42')).toBe(42);
    expect(parsePostId('007')).toBe(7);
  });

  it.each(['abc', '-1', '1.5', '', '2147483648'])('treats %j as a missing post', (raw) => {
    expect(() => parsePostId(raw)).toThrow(new NotFoundError(raw));
  });

  it('accepts the largest id', () => {
    expect(parsePostId('2147483647')).toBe(2147483647);
  });
});

describe('post resource', () => {
  let store: MemoryStorageDriver;

  beforeEach(async () => {
    store = new MemoryStorageDriver();
    await store.initialize();
  });

  it('creates a post with a Location header', async () => {
    const response = await createPost(
      store,
      jsonRequest(JSON.stringify({ title: 'Example Post', body: 'Hello', extra: true })),
      (id) => `/api/posts/${id}`
    );

    expect(response.status).toBe(201);
    expect(response.headers.get('location')).toBe('/api/posts/1');
    expect(await response.json()).toEqual({ id: 1, title: 'Example Post', body: 'Hello' });
  });

  it('rejects a body that is not JSON', async () => {
    await expect(createPost(store, jsonRequest('{"title":'), (id) => `/posts/${id}`)).rejects.toThrow(
      new ValidationError('Request body is not valid JSON')
    );
    expect(await store.count()).toBe(0);
  });

  it('lists with the query filter', async () => {
    await store.insert({ title: 'Bells', body: 'a' });
    await store.insert({ title: 'Whistles', body: 'b' });

    const response = await listPosts(store, new Request('http://localhost/posts?title_like=Whis'));

    expect(await response.json()).toEqual([{ id: 2, title: 'Whistles', body: 'b' }]);
  });

  it('gets and deletes by id', async () => {
    await store.insert({ title: 'Example Post', body: 'Hello' });

    expect(await (await getPost(store, '1')).json()).toEqual({
      id: 1,
      title: 'Example Post',
      body: 'Hello',
    });
    expect(await (await deletePost(store, '1')).json()).toEqual({
      message: 'Deleted post with id 1',
    });
    await expect(getPost(store, '1')).rejects.toThrow('Could not find post with id 1');
    await expect(deletePost(store, '1')).rejects.toThrow('Could not find post with id 1');
  });
});
