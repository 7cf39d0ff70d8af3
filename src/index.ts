/**
 * Image Rescale Proxy
 *
 * Serves rescaled variants of origin images:
 * - Cache hit: returns the variant from memory with long cache headers
 * - Cache miss: one upstream run per image and variant (origin fetch when
 *   bytes are forwarded, then the rescale service), stored, returned
 * - Concurrent misses for the same image share that run
 *
 * Errors:
 * - 400 malformed route or image URL
 * - 404 variant not served by the configured rescale endpoints
 * - 504 upstream timeout, 502 other upstream failures (never cached)
 */

import type { Logger } from 'pino';
import { createHealthResponse, createStatsResponse } from './analytics';
import { CacheStore } from './cache';
import type { Config } from './config';
import { errorCode, statusFromError } from './errors';
import type { Loggers } from './logger';
import { MagicResolver } from './magic';
import { Fetcher, type FetchFn } from './origin';
import { ImagePipeline } from './pipeline';
import { Rescaler } from './rescale';
import type { CacheEntry, CacheStatus } from './types';
import { errorResponse, getCORSHeaders } from './utils';
import { parseRequest } from './validation';

/** 30 days */
export const CACHE_CONTROL = 'public, max-age=2592000';

export interface AppDeps {
  config: Readonly<Config>;
  cache: CacheStore;
  pipeline: ImagePipeline;
  magic: MagicResolver;
  logger: Logger;
}

export interface App extends AppDeps {
  fetch(request: Request): Promise<Response>;
}

/**
 * Wire the cache, fetcher, rescaler, pipeline and resolver from configuration
 */
export function createDeps(config: Readonly<Config>, loggers: Loggers, fetchFn?: FetchFn): AppDeps {
  const cache = new CacheStore({ ...config.cache, logger: loggers.cache });
  const fetcher = new Fetcher({ config: config.origin, logger: loggers.fetch, fetchFn });
  const rescaler = new Rescaler({ config: config.rescale, upstream: config.origin, logger: loggers.fetch, fetchFn });
  const pipeline = new ImagePipeline({ cache, fetcher, rescaler, retry: config.retry, logger: loggers.imgs });
  const magic = new MagicResolver({
    fetcher,
    retry: config.retry,
    maxEntries: config.magicCacheEntries,
    logger: loggers.imgs,
  });

  return { config, cache, pipeline, magic, logger: loggers.imgs };
}

function imageHeaders(entry: CacheEntry, status: CacheStatus | 'cached'): Record<string, string> {
  return {
    'Content-Type': entry.contentType,
    'Content-Length': entry.size.toString(),
    'Cache-Control': CACHE_CONTROL,
    'ETag': entry.etag,
    'Last-Modified': new Date(entry.fetchedAt).toUTCString(),
    'X-Cache-Status': status,
    ...getCORSHeaders(),
  };
}

/**
 * 304 when If-None-Match names the entry's ETag
 */
export function handleConditionalRequest(request: Request, etag: string): Response | null {
  const ifNoneMatch = request.headers.get('If-None-Match');
  if (!ifNoneMatch) return null;

  const matches = ifNoneMatch
    .split(',')
    .map(tag => tag.trim().replace(/^W\//i, ''))
    .some(tag => tag === '*' || tag === etag);

  if (!matches) return null;

  return new Response(null, {
    status: 304,
    headers: {
      'ETag': etag,
      'Cache-Control': CACHE_CONTROL,
      ...getCORSHeaders(),
    },
  });
}

/**
 * Build the Fetch-API request handler
 */
export function createApp(deps: AppDeps): App {
  const { config, cache, pipeline, magic, logger } = deps;
  const startedAt = Date.now();

  async function serveImage(request: Request, url: URL): Promise<Response> {
    const parsed = parseRequest(url);
    logger.debug({ method: request.method, variant: parsed.variant, url: parsed.sourceUrl }, 'Request received');

    if (request.method === 'HEAD') {
      // HEAD never triggers upstream work
      const originUrl = parsed.indirect ? magic.peek(parsed.sourceUrl) : parsed.sourceUrl;
      const cached = originUrl ? pipeline.peek(originUrl, parsed.variant) : undefined;
      if (!cached) {
        return new Response(null, { status: 404, headers: getCORSHeaders() });
      }
      return new Response(null, { status: 200, headers: imageHeaders(cached, 'cached') });
    }

    const originUrl = parsed.indirect ? await magic.resolve(parsed.sourceUrl) : parsed.sourceUrl;
    const { entry, status } = await pipeline.getImage(originUrl, parsed.variant);

    const notModified = handleConditionalRequest(request, entry.etag);
    if (notModified) {
      return notModified;
    }

    return new Response(entry.bytes, { status: 200, headers: imageHeaders(entry, status) });
  }

  async function fetch(request: Request): Promise<Response> {
    const url = new URL(request.url);

    if (request.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: getCORSHeaders() });
    }

    if (url.pathname === '/health' || url.pathname === '/ping') {
      return createHealthResponse();
    }

    if (url.pathname === '/stats') {
      return createStatsResponse({ cache, pipeline, magic, mode: config.rescale.mode, startedAt });
    }

    if (request.method !== 'GET' && request.method !== 'HEAD') {
      return errorResponse('Method not allowed', 405);
    }

    try {
      return await serveImage(request, url);
    } catch (error) {
      const status = statusFromError(error);
      const message = error instanceof Error ? error.message : 'Unknown error';
      if (status === 500) {
        logger.error({ err: error, url: request.url }, 'Unhandled error serving image');
        return errorResponse('Internal error', 500, errorCode(error));
      }
      logger.info({ status, url: request.url }, message);
      return errorResponse(message, status, errorCode(error));
    }
  }

  return { ...deps, fetch };
}
