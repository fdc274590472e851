/**
 * Tests for request logging
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpResponse } from 'msw';
import { NotFoundError } from '../errors';
import { MiddlewareChain } from './chain';
import { createErrorMiddleware } from './errors';
import {
  createLoggerMiddleware,
  createSilentLogger,
  type LoggerMiddlewareConfig,
} from './logger';
import type { MiddlewareContext } from './types';

interface LogLine {
  message: string;
  data: unknown;
}

function context(url: string, operation: string, params: Record<string, string> = {}): MiddlewareContext {
  return { request: new Request(url), operation, params, metadata: {} };
}

function collect(config?: LoggerMiddlewareConfig) {
  const lines: LogLine[] = [];
  const logger = createLoggerMiddleware({
    ...config,
    log: (message, data) => lines.push({ message, data }),
  });
  const chain = new MiddlewareChain([logger, createErrorMiddleware({ log: () => {} })]);
  return { lines, chain };
}

describe('createLoggerMiddleware', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs only the response line at the default level', async () => {
    const { lines, chain } = collect();

    await chain.execute(context('http://localhost/posts', 'list'), async () => HttpResponse.json([]));

    expect(lines).toHaveLength(1);
    expect(lines[0].message).toMatch(/^\[.+\] \[posts-api\] ← GET \/posts 200 \(\d+ms\)$/);
    expect(lines[0].data).toEqual({ operation: 'list', status: 200, duration: expect.any(Number) });
  });

  it('logs requests at debug with query parameters redacted', async () => {
    const { lines, chain } = collect({ level: 'debug' });

    await chain.execute(
      context('http://localhost/posts?title_like=x&token=test-secret', 'list'),
      async () => HttpResponse.json([])
    );

    expect(lines).toHaveLength(2);
    expect(lines[0].message).toMatch(/^\[.+\] \[posts-api\] → GET \/posts$/);
    expect(lines[0].data).toEqual({
      operation: 'list',
      query: { title_like: 'x', token: '[REDACTED]' },
    });
  });

  it('includes route params in request data', async () => {
    const { lines, chain } = collect({ level: 'debug' });

    await chain.execute(
      context('http://localhost/posts/3', 'get', { id: '3' }),
      async () => HttpResponse.json({})
    );

    expect(lines[0].data).toEqual({ operation: 'get', params: { id: '3' } });
  });

  it('logs client errors at warn before the mapped response', async () => {
    const { lines, chain } = collect({ logTiming: false });

    await chain.execute(context('http://localhost/posts/5', 'get', { id: '5' }), async () => {
      throw new NotFoundError(5);
    });

    expect(lines.map((line) => line.message.replace(/^\[.+?\] /, ''))).toEqual([
      '[posts-api] ✗ GET /posts/5 ERROR',
      '[posts-api] ← GET /posts/5 404',
    ]);
    expect(lines[0].data).toEqual({ operation: 'get', error: 'Could not find post with id 5' });
  });

  it('drops lines below the configured level', async () => {
    const { lines, chain } = collect({ level: 'error' });

    await chain.execute(context('http://localhost/posts/5', 'get'), async () => {
      throw new NotFoundError(5);
    });
    expect(lines).toHaveLength(0);

    await chain.execute(context('http://localhost/posts', 'list'), async () => {
      throw new Error('disk full');
    });
    expect(lines).toHaveLength(1);
    expect(lines[0].data).toMatchObject({ operation: 'list', error: 'disk full' });
  });

  it('uses a custom formatter', async () => {
    const { lines, chain } = collect({
      formatter: (type, ctx) => `${type}:${ctx.operation}`,
    });

    await chain.execute(context('http://localhost/posts', 'list'), async () => HttpResponse.json([]));

    expect(lines.map((line) => line.message)).toEqual(['response:list']);
  });

  it('writes to console.log by default', async () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const chain = new MiddlewareChain([createLoggerMiddleware()]);

    await chain.execute(context('http://localhost/posts', 'list'), async () => HttpResponse.json([]));

    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe('createSilentLogger', () => {
  it('logs nothing and passes the response through', async () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const chain = new MiddlewareChain([createSilentLogger()]);

    const response = await chain.execute(
      context('http://localhost/posts', 'list'),
      async () => HttpResponse.json([], { status: 200 })
    );

    expect(response.status).toBe(200);
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
