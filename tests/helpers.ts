import pino from 'pino';
import { vi } from 'vitest';
import { loadConfig, type Config, type UpstreamConfig } from '../src/config';
import type { FetchFn } from '../src/origin';
import type { Env } from '../src/types';

export const ORIGIN_URL = 'https://origin.test/photos/cat.png';
export const THUMB_ENDPOINT = 'https://rescale.test/thumb?url=';
export const LARGE_ENDPOINT = 'https://rescale.test/large?url=';

export const silentLogger = pino({ level: 'silent' });

/**
 * Per-variant configuration with fast retries, overridable per test
 */
export function testConfig(env: Env = {}): Readonly<Config> {
  return loadConfig({
    IMAGE_RESCALE_URL_Thumbnail: THUMB_ENDPOINT,
    IMAGE_RESCALE_URL_Large: LARGE_ENDPOINT,
    FETCH_TIMEOUT: '1000',
    RESCALE_TIMEOUT: '1000',
    RETRY_ATTEMPTS: '2',
    RETRY_BASE_DELAY: '1',
    LOG_LEVEL: 'silent',
    ...env,
  });
}

export function upstreamConfig(overrides: Partial<UpstreamConfig> = {}): UpstreamConfig {
  return {
    referer: undefined,
    userAgent: 'test-agent',
    timeoutMs: 1000,
    maxBytes: 1024,
    ...overrides,
  };
}

export function imageResponse(bytes: number[], contentType = 'image/png', status = 200): Response {
  return new Response(new Uint8Array(bytes), { status, headers: { 'content-type': contentType } });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status, headers: { 'content-type': 'text/plain; charset=utf-8' } });
}

export function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

export function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

/**
 * A fetch that never answers until its signal aborts
 */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(abortError()));
  });

type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * fetch stand-in answering by exact URL; unknown URLs get a 404
 */
export function routeFetch(routes: Record<string, Route>) {
  return vi.fn<FetchFn>(async (input, init) => {
    const route = routes[urlOf(input)];
    if (!route) {
      return new Response('not found', { status: 404, headers: { 'content-type': 'text/plain' } });
    }
    return route(init);
  });
}

export function callsTo(fetchFn: ReturnType<typeof routeFetch>, url: string): number {
  return fetchFn.mock.calls.filter(([input]) => urlOf(input) === url).length;
}

export function headersOf(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}
