/**
 * Indirect ("magic") image URLs
 *
 * The indirect URL answers with a text/plain body holding the real image URL.
 * Resolutions are remembered in a bounded map (oldest dropped first);
 * failures are not remembered.
 */

import type { Logger } from 'pino';
import type { RetryConfig } from './config';
import { FetchError, isTransientError, toPipelineError } from './errors';
import type { Fetcher } from './origin';
import { withRetry } from './retry';
import { SingleFlight } from './single-flight';
import { isTextContentType } from './validation';

export interface MagicResolverOptions {
  fetcher: Fetcher;
  retry: RetryConfig;
  maxEntries: number;
  logger: Logger;
}

export class MagicResolver {
  private readonly fetcher: Fetcher;
  private readonly retry: RetryConfig;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private readonly resolved = new Map<string, string>();
  private readonly inFlight = new SingleFlight<string>();

  constructor(options: MagicResolverOptions) {
    this.fetcher = options.fetcher;
    this.retry = options.retry;
    this.maxEntries = options.maxEntries;
    this.logger = options.logger;
  }

  get size(): number {
    return this.resolved.size;
  }

  /** Previously resolved target, without any upstream call */
  peek(indirectUrl: string): string | undefined {
    return this.resolved.get(indirectUrl);
  }

  /**
   * Resolve an indirect URL to the image URL it names
   *
   * @throws PipelineError with kind "FetchFailed"
   */
  async resolve(indirectUrl: string): Promise<string> {
    const known = this.resolved.get(indirectUrl);
    if (known) {
      this.logger.debug({ url: indirectUrl }, `Retrieving from magic cache ${indirectUrl}`);
      return known;
    }
    return this.inFlight.do(indirectUrl, () => this.lookup(indirectUrl));
  }

  private async lookup(indirectUrl: string): Promise<string> {
    try {
      const payload = await withRetry(() => this.fetcher.fetch(indirectUrl), {
        retries: this.retry.retries,
        baseDelayMs: this.retry.baseDelayMs,
        shouldRetry: isTransientError,
      });

      if (!isTextContentType(payload.contentType)) {
        throw new FetchError('InvalidContentType', `Expected text/plain from ${indirectUrl}, got ${payload.contentType}`, {
          url: indirectUrl,
        });
      }

      const target = new TextDecoder().decode(payload.bytes).trim();
      if (!/^https?:\/\/[^\s]+$/i.test(target)) {
        throw new FetchError('InvalidContentType', `Indirect URL ${indirectUrl} did not name an http(s) URL`, {
          url: indirectUrl,
        });
      }

      this.remember(indirectUrl, target);
      this.logger.info({ url: indirectUrl, target }, `Caching magic ${indirectUrl}`);
      return target;
    } catch (error) {
      const failure = toPipelineError(error);
      this.logger.warn({ url: indirectUrl, kind: failure.upstreamKind }, `Magic resolve failed: ${failure.message}`);
      throw failure;
    }
  }

  private remember(indirectUrl: string, target: string): void {
    this.resolved.set(indirectUrl, target);
    while (this.resolved.size > this.maxEntries) {
      const oldest = this.resolved.keys().next();
      if (oldest.done) break;
      this.resolved.delete(oldest.value);
    }
  }
}
