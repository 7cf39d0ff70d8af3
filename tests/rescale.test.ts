import { describe, test, expect, vi } from 'vitest';
import { RescaleError } from '../src/errors';
import type { FetchFn } from '../src/origin';
import { Rescaler } from '../src/rescale';
import type { Env } from '../src/types';
import {
  LARGE_ENDPOINT,
  ORIGIN_URL,
  THUMB_ENDPOINT,
  headersOf,
  imageResponse,
  routeFetch,
  silentLogger,
  testConfig,
  urlOf,
} from './helpers';

function rescalerWith(fetchFn: FetchFn, env: Env = {}): Rescaler {
  const config = testConfig(env);
  return new Rescaler({ config: config.rescale, upstream: config.origin, logger: silentLogger, fetchFn });
}

async function failureOf(promise: Promise<unknown>): Promise<RescaleError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RescaleError) return error;
    throw error;
  }
  throw new Error('Expected a RescaleError');
}

describe('Rescaler', () => {
  test('generic mode appends the origin URL to the single endpoint', () => {
    const rescaler = rescalerWith(vi.fn<FetchFn>(), { IMAGE_RESCALE_URL: 'https://x/resize?url=' });

    expect(rescaler.mode).toBe('generic');
    expect(rescaler.buildUrl('https://origin/img.png', 'Thumbnail')).toBe('https://x/resize?url=https://origin/img.png');
    expect(rescaler.buildUrl('https://origin/img.png', 'Generic')).toBe('https://x/resize?url=https://origin/img.png');
  });

  test('per-variant mode picks the endpoint for the variant', async () => {
    const fetchFn = routeFetch({
      [`${LARGE_ENDPOINT}${ORIGIN_URL}`]: () => imageResponse([7, 7], 'image/webp'),
    });
    const rescaler = rescalerWith(fetchFn);

    const payload = await rescaler.rescale({ kind: 'url', originUrl: ORIGIN_URL }, 'Large');

    expect(Array.from(payload.bytes)).toEqual([7, 7]);
    expect(payload.contentType).toBe('image/webp');
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(urlOf(fetchFn.mock.calls[0][0])).toBe(`${LARGE_ENDPOINT}${ORIGIN_URL}`);
    expect(fetchFn.mock.calls[0][1]?.method).toBe('GET');
  });

  test('variant without an endpoint fails with UnsupportedVariant and makes no call', async () => {
    const fetchFn = vi.fn<FetchFn>();
    const rescaler = rescalerWith(fetchFn);

    const error = await failureOf(rescaler.rescale({ kind: 'url', originUrl: ORIGIN_URL }, 'Generic'));

    expect(error.kind).toBe('UnsupportedVariant');
    expect(error.message).toBe('No rescale endpoint configured for Generic');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  test('endpointFor throws synchronously for a missing variant', () => {
    const rescaler = rescalerWith(vi.fn<FetchFn>(), { IMAGE_RESCALE_URL_Large: '' });

    expect(rescaler.endpointFor('Thumbnail')).toBe(THUMB_ENDPOINT);
    expect(() => rescaler.endpointFor('Large')).toThrow('No rescale endpoint configured for Large');
  });

  test('bytes source is POSTed with its content type', async () => {
    const fetchFn = routeFetch({
      [`${THUMB_ENDPOINT}${ORIGIN_URL}`]: () => imageResponse([5], 'image/png'),
    });
    const rescaler = rescalerWith(fetchFn, { IMAGE_RESCALE_FORWARD: 'bytes' });
    const bytes = new Uint8Array([1, 2, 3]);

    await rescaler.rescale({ kind: 'bytes', originUrl: ORIGIN_URL, bytes, contentType: 'image/gif' }, 'Thumbnail');

    const init = fetchFn.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(bytes);
    expect(headersOf(init).get('content-type')).toBe('image/gif');
  });

  test('sends the configured Referer to the rescale service', async () => {
    const fetchFn = routeFetch({
      [`${THUMB_ENDPOINT}${ORIGIN_URL}`]: () => imageResponse([5]),
    });
    const rescaler = rescalerWith(fetchFn, { REFERER: 'https://site.test/' });

    await rescaler.rescale({ kind: 'url', originUrl: ORIGIN_URL }, 'Thumbnail');

    expect(headersOf(fetchFn.mock.calls[0][1]).get('referer')).toBe('https://site.test/');
  });

  test('error status fails with UpstreamStatus', async () => {
    const fetchFn = routeFetch({
      [`${THUMB_ENDPOINT}${ORIGIN_URL}`]: () => new Response('boom', { status: 500 }),
    });

    const error = await failureOf(rescalerWith(fetchFn).rescale({ kind: 'url', originUrl: ORIGIN_URL }, 'Thumbnail'));

    expect(error.kind).toBe('UpstreamStatus');
    expect(error.status).toBe(500);
  });

  test('needsOriginBytes only in per-variant mode with bytes forwarding', () => {
    const fetchFn = vi.fn<FetchFn>();

    expect(rescalerWith(fetchFn).needsOriginBytes).toBe(false);
    expect(rescalerWith(fetchFn, { IMAGE_RESCALE_FORWARD: 'bytes' }).needsOriginBytes).toBe(true);
    expect(
      rescalerWith(fetchFn, { IMAGE_RESCALE_URL: 'https://x/resize?url=', IMAGE_RESCALE_FORWARD: 'bytes' })
        .needsOriginBytes
    ).toBe(false);
  });
});
