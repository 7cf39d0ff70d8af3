/**
 * Client for the external rescale service
 *
 * Endpoints are templates: the origin URL is appended verbatim, so
 * "https://x/resize?url=" + "https://origin/img.png" becomes
 * "https://x/resize?url=https://origin/img.png".
 *
 * In generic mode, and in per-variant mode with forward = "url", the service
 * fetches the origin itself (GET). With forward = "bytes" the pipeline fetches
 * the origin first and the bytes are POSTed to the endpoint.
 */

import type { Logger } from 'pino';
import type { RescaleConfig, RescaleMode, UpstreamConfig } from './config';
import { RescaleError } from './errors';
import { callUpstream, type FetchFn, type UpstreamErrorFactory } from './origin';
import type { RescaleSource, UpstreamPayload, Variant } from './types';

export interface RescalerOptions {
  config: RescaleConfig;
  /** Referer, user agent and size cap shared with origin requests */
  upstream: UpstreamConfig;
  logger: Logger;
  fetchFn?: FetchFn;
}

const rescaleError: UpstreamErrorFactory<RescaleError> = (kind, message, details) =>
  new RescaleError(kind, message, details);

export class Rescaler {
  private readonly config: RescaleConfig;
  private readonly upstream: UpstreamConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(options: RescalerOptions) {
    this.config = options.config;
    this.upstream = options.upstream;
    this.logger = options.logger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get mode(): RescaleMode {
    return this.config.mode;
  }

  /**
   * Whether the pipeline must fetch origin bytes before calling rescale()
   */
  get needsOriginBytes(): boolean {
    return this.config.mode === 'per-variant' && this.config.forward === 'bytes';
  }

  /**
   * Variant under which results are cached. Every variant shares one endpoint
   * in generic mode, so they share one cache slot too.
   */
  keyVariant(variant: Variant): Variant {
    return this.config.mode === 'generic' ? 'Generic' : variant;
  }

  /**
   * Endpoint template serving `variant`
   *
   * @throws RescaleError with kind "UnsupportedVariant"
   */
  endpointFor(variant: Variant): string {
    const endpoint = this.config.endpoints[variant];
    if (!endpoint) {
      throw new RescaleError('UnsupportedVariant', `No rescale endpoint configured for ${variant}`);
    }
    return endpoint;
  }

  /**
   * Outbound URL for one origin image and variant
   */
  buildUrl(originUrl: string, variant: Variant): string {
    return `${this.endpointFor(variant)}${originUrl}`;
  }

  /**
   * Ask the rescale service for `variant` of the source image
   *
   * @throws RescaleError
   */
  async rescale(source: RescaleSource, variant: Variant): Promise<UpstreamPayload> {
    const url = this.buildUrl(source.originUrl, variant);
    const request = {
      url,
      referer: this.upstream.referer,
      userAgent: this.upstream.userAgent,
      timeoutMs: this.config.timeoutMs,
      maxBytes: this.upstream.maxBytes,
    };

    this.logger.info({ url, variant, source: source.kind }, `Rescaling ${variant} ${source.originUrl}`);

    try {
      const payload =
        source.kind === 'bytes'
          ? await callUpstream(
              this.fetchFn,
              { ...request, method: 'POST', body: source.bytes, contentType: source.contentType },
              rescaleError
            )
          : await callUpstream(this.fetchFn, request, rescaleError);

      this.logger.debug({ url, size: payload.bytes.byteLength }, `Rescaled ${variant} ${source.originUrl}`);
      return payload;
    } catch (error) {
      this.logger.warn({ url, err: error }, `Rescale failed for ${variant} ${source.originUrl}`);
      throw error;
    }
  }
}
