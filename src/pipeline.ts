/**
 * Fetch-rescale-cache pipeline
 *
 * Per key: Idle -> InFlight -> { Cached | Failed }
 *
 * 1. Cache hit: return the entry.
 * 2. Another request for the key is in flight: await its result.
 * 3. Otherwise run the upstream work once (fetch when bytes are forwarded,
 *    then rescale), store the entry, and hand the same outcome to every waiter.
 *
 * Steps 1-2 and registering the in-flight marker happen before the first
 * await, so two runs for one key can never overlap. Failures are never
 * cached; the marker is dropped and the next request starts over.
 * Work continues even if the caller that started it goes away.
 */

import type { Logger } from 'pino';
import { cacheKeyOf, createCacheEntry, type CacheStore } from './cache';
import type { RetryConfig } from './config';
import { FetchError, isTransientError, toPipelineError } from './errors';
import type { Fetcher } from './origin';
import type { Rescaler } from './rescale';
import { withRetry, type RetryOptions } from './retry';
import { SingleFlight } from './single-flight';
import type { CacheEntry, ImageResult, RequestKey, RescaleSource, Variant } from './types';
import { isImageContentType } from './validation';

export interface PipelineOptions {
  cache: CacheStore;
  fetcher: Fetcher;
  rescaler: Rescaler;
  retry: RetryConfig;
  logger: Logger;
}

export class ImagePipeline {
  private readonly cache: CacheStore;
  private readonly fetcher: Fetcher;
  private readonly rescaler: Rescaler;
  private readonly retry: RetryConfig;
  private readonly logger: Logger;
  private readonly inFlight = new SingleFlight<CacheEntry>();

  constructor(options: PipelineOptions) {
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.rescaler = options.rescaler;
    this.retry = options.retry;
    this.logger = options.logger;
  }

  /**
   * Serve `variant` of the origin image, from cache or via a single upstream run
   *
   * @throws PipelineError (the same instance for every waiter on a failed run)
   */
  async getImage(originUrl: string, variant: Variant): Promise<ImageResult> {
    const key = this.keyFor(originUrl, variant);

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug({ variant, url: originUrl }, `Retrieving from cache ${variant} ${originUrl}`);
      return { entry: cached, status: 'hit' };
    }

    const flight = this.inFlight.run(cacheKeyOf(key), () => this.execute(key));
    if (flight.shared) {
      this.logger.debug({ variant, url: originUrl }, `Joining in-flight ${variant} ${originUrl}`);
    }

    const entry = await flight.promise;
    return { entry, status: flight.shared ? 'coalesced' : 'miss' };
  }

  /**
   * Number of keys with an upstream run in progress
   */
  inFlightCount(): number {
    return this.inFlight.size;
  }

  isInFlight(originUrl: string, variant: Variant): boolean {
    return this.inFlight.has(cacheKeyOf(this.keyFor(originUrl, variant)));
  }

  /**
   * Cached entry for the request, without upstream work or recency update
   */
  peek(originUrl: string, variant: Variant): CacheEntry | undefined {
    return this.cache.peek(this.keyFor(originUrl, variant));
  }

  private keyFor(originUrl: string, variant: Variant): RequestKey {
    return { originUrl, variant: this.rescaler.keyVariant(variant) };
  }

  private async execute(key: RequestKey): Promise<CacheEntry> {
    const { originUrl, variant } = key;
    const startTime = Date.now();

    try {
      // Unsupported variants fail before any upstream call
      this.rescaler.endpointFor(variant);

      const source = await this.resolveSource(originUrl);
      const rescaled = await withRetry(
        () => this.rescaler.rescale(source, variant),
        this.retryPolicy(`rescale ${variant} ${originUrl}`)
      );

      const entry = createCacheEntry(key, rescaled);
      this.cache.put(key, entry);

      this.logger.info(
        { variant, url: originUrl, size: entry.size, ms: Date.now() - startTime },
        `Served ${variant} ${originUrl}`
      );
      return entry;
    } catch (error) {
      const failure = toPipelineError(error);
      this.logger.warn(
        { variant, url: originUrl, kind: failure.kind, upstream: failure.upstreamKind, ms: Date.now() - startTime },
        `Failed ${variant} ${originUrl}: ${failure.message}`
      );
      throw failure;
    }
  }

  private async resolveSource(originUrl: string): Promise<RescaleSource> {
    if (!this.rescaler.needsOriginBytes) {
      return { kind: 'url', originUrl };
    }

    const origin = await withRetry(() => this.fetcher.fetch(originUrl), this.retryPolicy(`fetch ${originUrl}`));
    if (!isImageContentType(origin.contentType)) {
      throw new FetchError('InvalidContentType', `Origin is not an image (${origin.contentType}): ${originUrl}`, {
        url: originUrl,
      });
    }
    return { kind: 'bytes', originUrl, bytes: origin.bytes, contentType: origin.contentType };
  }

  private retryPolicy(label: string): RetryOptions {
    return {
      retries: this.retry.retries,
      baseDelayMs: this.retry.baseDelayMs,
      shouldRetry: isTransientError,
      onRetry: (error: unknown, attempt: number, delayMs: number) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.info({ attempt, delayMs }, `Retrying ${label} (attempt ${attempt}) after: ${message}`);
      },
    };
  }
}
