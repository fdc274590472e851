/**
 * Tests for serving the handlers over a real socket
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { loadConfig } from '../config';
import { startServer, type ServerHandle } from './server';

describe('startServer', () => {
  let server: ServerHandle;

  beforeAll(async () => {
    server = await startServer(
      loadConfig({}, { port: 0, logLevel: 'silent', apiPrefix: '/api', seed: 2 })
    );
  });

  afterAll(async () => {
    await server.close();
  });

  it('reports the bound address with the prefix', () => {
    expect(server.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/api$/);
    expect(server.url).not.toBe('http://127.0.0.1:0/api');
  });

  it('serves seeded posts', async () => {
    const response = await fetch(`${server.url}/posts`);
    const posts: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(Array.isArray(posts) && posts.length).toBe(2);
  });

  it('creates a post from a JSON body', async () => {
    const response = await fetch(`${server.url}/posts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ title: 'Over the wire', body: 'Hello' }),
    });

    expect(response.status).toBe(201);
    expect(response.headers.get('location')).toBe('/api/posts/3');
    expect(await response.json()).toEqual({ id: 3, title: 'Over the wire', body: 'Hello' });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const response = await fetch(`${server.url}/comments`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Not found' });
  });

  it('does not serve the routes outside the prefix', async () => {
    const { origin } = new URL(server.url);

    const outside = await fetch(`${origin}/posts`);
    expect(outside.status).toBe(404);
    expect(await outside.json()).toEqual({ message: 'Not found' });

    const nested = await fetch(`${origin}/other/api/posts`);
    expect(nested.status).toBe(404);
    expect(await nested.json()).toEqual({ message: 'Not found' });
  });

  it('returns 415 for a body that is not JSON', async () => {
    const response = await fetch(`${server.url}/posts`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: JSON.stringify({ title: 'a', body: 'b' }),
    });

    expect(response.status).toBe(415);
    expect(await response.json()).toEqual({ message: 'Request must contain application/json data' });
  });

  it('returns 422 for a non-string body', async () => {
    const response = await fetch(`${server.url}/posts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ title: 'Example Post', body: 32 }),
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ message: "32 is not of type 'string'" });
  });

  it('returns 422 for malformed JSON', async () => {
    const response = await fetch(`${server.url}/posts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"title": "unterminated',
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ message: 'Request body is not valid JSON' });
  });

  it('returns 404 for a missing post', async () => {
    const response = await fetch(`${server.url}/posts/99`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Could not find post with id 99' });
  });

  it('deletes a post, after which it is gone', async () => {
    const deleted = await fetch(`${server.url}/posts/1`, { method: 'DELETE' });
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ message: 'Deleted post with id 1' });

    const fetched = await fetch(`${server.url}/posts/1`);
    expect(fetched.status).toBe(404);
    expect(await fetched.json()).toEqual({ message: 'Could not find post with id 1' });
  });
});
