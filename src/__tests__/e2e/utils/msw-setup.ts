/**
 * MSW Setup Utilities for E2E Tests
 *
 * Runs the post handlers in-process through `msw/node`, so the tests
 * drive them with the global fetch and no open port.
 */

import { setupServer, type SetupServer } from 'msw/node';
import { createHandlers, type HandlerOptions } from '../../../runtime/handlers';
import type { StorageDriver } from '../../../storage/types';

/**
 * MSW server instance type
 */
export type MockServer = SetupServer;

/**
 * Base URL the tests send requests to.
 */
export const BASE_URL = 'http://localhost';

/**
 * Create an MSW server serving the post handlers for a store on
 * BASE_URL. Logging is off unless the options turn it back on.
 */
export function createMockServer(store: StorageDriver, options?: HandlerOptions): MockServer {
  return setupServer(...createHandlers(store, { quiet: true, origin: BASE_URL, ...options }));
}

/**
 * Start MSW server for testing. Requests no handler matches fail the test.
 */
export function startMockServer(server: MockServer): void {
  server.listen({
    onUnhandledRequest: 'error',
  });
}

/**
 * Stop MSW server
 */
export function stopMockServer(server: MockServer): void {
  server.close();
}

/**
 * Helper to create POST request options with JSON body
 */
export function postJson(body: unknown, headers?: Record<string, string>): RequestInit {
  return {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

/**
 * Helper to create DELETE request options
 */
export function deleteRequest(headers?: Record<string, string>): RequestInit {
  return {
    method: 'DELETE',
    headers,
  };
}

/**
 * Fetch and parse a JSON response, keeping status and headers.
 */
export async function fetchJson(
  path: string,
  init?: RequestInit
): Promise<{ status: number; headers: Headers; data: unknown }> {
  const response = await fetch(`${BASE_URL}${path}`, init);
  const data: unknown = await response.json();
  return { status: response.status, headers: response.headers, data };
}
