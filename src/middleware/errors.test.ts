/**
 * Tests for error-to-response mapping
 */
import { describe, it, expect, vi } from 'vitest';
import { MethodNotAllowedError, NotFoundError, UnsupportedMediaTypeError } from '../errors';
import { MiddlewareChain } from './chain';
import { createErrorMiddleware, errorResponse } from './errors';
import type { MiddlewareContext } from './types';

function context(): MiddlewareContext {
  return {
    request: new Request('http://localhost/posts/7'),
    operation: 'get',
    params: { id: '7' },
    metadata: {},
  };
}

describe('errorResponse', () => {
  it('builds a JSON message body', async () => {
    const response = errorResponse(404, 'Not found');

    expect(response.status).toBe(404);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(await response.json()).toEqual({ message: 'Not found' });
  });
});

describe('createErrorMiddleware', () => {
  it('maps an ApiError to its status and message', async () => {
    const chain = new MiddlewareChain([createErrorMiddleware()]);

    const response = await chain.execute(context(), async () => {
      throw new NotFoundError(7);
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Could not find post with id 7' });
  });

  it('maps errors raised by before hooks', async () => {
    const chain = new MiddlewareChain([
      createErrorMiddleware(),
      {
        name: 'gate',
        before: async () => ({
          continue: false,
          error: new UnsupportedMediaTypeError('application/json'),
        }),
      },
    ]);

    const response = await chain.execute(context(), async () => new Response('unreachable'));

    expect(response.status).toBe(415);
    expect(await response.json()).toEqual({
      message: 'Request must contain application/json data',
    });
  });

  it('adds an Allow header to 405 responses', async () => {
    const chain = new MiddlewareChain([createErrorMiddleware()]);

    const response = await chain.execute(context(), async () => {
      throw new MethodNotAllowedError(['GET', 'DELETE']);
    });

    expect(response.status).toBe(405);
    expect(response.headers.get('allow')).toBe('GET, DELETE');
    expect(await response.json()).toEqual({ message: 'Method not allowed' });
  });

  it('hides unexpected errors behind a 500 and logs them', async () => {
    const log = vi.fn();
    const chain = new MiddlewareChain([createErrorMiddleware({ log })]);
    const failure = new Error('connection reset');

    const response = await chain.execute(context(), async () => {
      throw failure;
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ message: 'Internal server error' });
    expect(log).toHaveBeenCalledWith('Unhandled error in get', failure);
  });
});
