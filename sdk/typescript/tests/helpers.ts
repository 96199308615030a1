/**
 * Shared fetch stub for client tests. Requests never leave the process.
 */

import { vi, type Mock } from 'vitest';

import { PortalClient } from '../src/client.js';

export type FetchMock = Mock<typeof fetch>;

export const SERVER = 'http://portal.test';
export const TOKEN = 'test-token';

export function mockFetch(): FetchMock {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export interface SentRequest {
  url: URL;
  method: string | undefined;
  body: RequestInit['body'];
}

export function sentRequest(fetchMock: FetchMock, index: number): SentRequest {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`no request #${index}`);
  }
  const [input, init] = call;
  const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
  return { url: new URL(href), method: init?.method, body: init?.body };
}

export function sentForm(fetchMock: FetchMock, index: number): URLSearchParams {
  const { body } = sentRequest(fetchMock, index);
  if (!(body instanceof URLSearchParams)) {
    throw new Error(`request #${index} is not form encoded`);
  }
  return body;
}

export function sentMultipart(fetchMock: FetchMock, index: number): FormData {
  const { body } = sentRequest(fetchMock, index);
  if (!(body instanceof FormData)) {
    throw new Error(`request #${index} is not multipart`);
  }
  return body;
}

/** A client that has already logged in with TOKEN. Uses up request #0. */
export async function loggedInClient(fetchMock: FetchMock): Promise<PortalClient> {
  fetchMock.mockResolvedValueOnce(jsonResponse({ access_token: TOKEN }));
  const client = new PortalClient({ server: `${SERVER}/`, login: 'bot', key: 'test-secret' });
  await client.login();
  return client;
}
