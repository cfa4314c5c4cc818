import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Props } from '../../src/utils';
import { BusinessObjectsClient } from '../../src/businessobjects/businessobjects-client';

// Test utilities for BusinessObjects client, service and server tests

export const BASE_URL = 'https://bo.test/biprws';
export const TEST_TOKEN = 'test-logon-token';

export const testProps: Props = {
  instanceUrl: BASE_URL,
  username: 'analyst',
  password: 'test-secret',
  authType: 'secEnterprise',
};

export type RouteHandler = (init: RequestInit) => Response | Promise<Response>;

/**
 * Routes keyed by "<METHOD> <path relative to BASE_URL>"
 */
export type Routes = Record<string, RouteHandler>;

export type FetchMock = Mock<(input: string, init: RequestInit) => Promise<Response>>;

/**
 * Creates a JSON response; a fresh one per call since bodies are read once
 */
export function jsonResponse(
  data: unknown,
  options: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(data), {
    status: options.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...options.headers },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

/**
 * A response whose headers arrive but whose body stream fails, as when the
 * connection drops mid-transfer
 */
export function brokenBodyResponse(status = 200): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new TypeError('terminated'));
    },
  });
  return new Response(body, { status });
}

export const loginRoute: Routes = {
  'POST /logon/long': () => jsonResponse({}, { headers: { 'X-SAP-LogonToken': TEST_TOKEN } }),
};

/**
 * Replaces global fetch with an in-process fake of the REST API.
 * Unknown routes answer 404.
 */
export function installFetchRoutes(routes: Routes): FetchMock {
  const fetchMock: FetchMock = vi.fn(async (input: string, init: RequestInit) => {
    const key = `${init.method ?? 'GET'} ${input.slice(BASE_URL.length)}`;
    const handler = routes[key];
    if (!handler) {
      return textResponse(`No route for ${key}`, 404);
    }
    return handler(init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

/**
 * The "<METHOD> <path>" keys of every request the fake received, in order
 */
export function requestedRoutes(fetchMock: FetchMock): string[] {
  return fetchMock.mock.calls.map(([input, init]) => `${init.method ?? 'GET'} ${input.slice(BASE_URL.length)}`);
}

/**
 * The parsed JSON body of the nth request sent to the given route
 */
export function requestBody(fetchMock: FetchMock, route: string, nth = 0): unknown {
  const calls = fetchMock.mock.calls.filter(([input, init]) =>
    `${init.method ?? 'GET'} ${input.slice(BASE_URL.length)}` === route
  );
  const body = calls[nth]?.[1].body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export async function createLoggedInClient(routes: Routes): Promise<{ client: BusinessObjectsClient; fetchMock: FetchMock }> {
  const fetchMock = installFetchRoutes({ ...loginRoute, ...routes });
  const client = new BusinessObjectsClient(testProps);
  await client.login();
  return { client, fetchMock };
}
