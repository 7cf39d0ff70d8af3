/**
 * Outbound HTTP with timeout, size cap and Referer, and the origin Fetcher
 * built on it.
 *
 * The timeout covers the whole exchange: headers and body. Errors are
 * classified into UpstreamError kinds by the caller's factory so the Fetcher
 * and the Rescaler each raise their own error class.
 */

import type { Logger } from 'pino';
import type { UpstreamConfig } from './config';
import { FetchError, UpstreamError, type UpstreamErrorKind } from './errors';
import type { UpstreamPayload } from './types';

export type FetchFn = typeof fetch;

export type UpstreamErrorFactory<E extends UpstreamError> = (
  kind: UpstreamErrorKind,
  message: string,
  details: { url: string; status?: number; cause?: unknown }
) => E;

export interface UpstreamRequest {
  url: string;
  method?: 'GET' | 'POST';
  body?: Uint8Array;
  contentType?: string;
  referer?: string;
  userAgent: string;
  timeoutMs: number;
  maxBytes: number;
}

/**
 * Release the connection behind a response whose body will not be read
 */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Read a response body, rejecting it once it exceeds maxSize
 *
 * @throws the factory's error with kind "TooLarge"
 */
export async function readBody<E extends UpstreamError>(
  response: Response,
  url: string,
  maxSize: number,
  toError: UpstreamErrorFactory<E>
): Promise<Uint8Array> {
  // Check content-length first, then the actual bytes (the header can be missing or wrong)
  const contentLength = response.headers.get('content-length');
  if (contentLength) {
    const size = parseInt(contentLength, 10);
    if (!isNaN(size) && size > maxSize) {
      await discardBody(response);
      throw toError('TooLarge', `File too large: ${size} bytes (max ${maxSize} bytes)`, { url });
    }
  }

  const data = new Uint8Array(await response.arrayBuffer());
  if (data.byteLength > maxSize) {
    throw toError('TooLarge', `File too large: ${data.byteLength} bytes (max ${maxSize} bytes)`, { url });
  }
  return data;
}

/**
 * Perform one upstream call and return its body and content type
 *
 * @throws the factory's error: Timeout, Network, UpstreamStatus,
 *   InvalidContentType (no content-type header) or TooLarge
 */
export async function callUpstream<E extends UpstreamError>(
  fetchFn: FetchFn,
  request: UpstreamRequest,
  toError: UpstreamErrorFactory<E>
): Promise<UpstreamPayload> {
  const { url, timeoutMs } = request;

  const headers: Record<string, string> = { 'User-Agent': request.userAgent };
  if (request.referer) {
    headers['Referer'] = request.referer;
  }
  if (request.body && request.contentType) {
    headers['Content-Type'] = request.contentType;
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: request.method ?? 'GET',
      headers,
      body: request.body,
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      await discardBody(response);
      throw toError('UpstreamStatus', `Upstream responded ${response.status} for ${url}`, {
        url,
        status: response.status,
      });
    }

    const contentType = response.headers.get('content-type');
    if (!contentType) {
      await discardBody(response);
      throw toError('InvalidContentType', `Missing content-type from ${url}`, { url });
    }

    const bytes = await readBody(response, url, request.maxBytes, toError);
    return { bytes, contentType };
  } catch (error) {
    if (error instanceof UpstreamError) {
      throw error;
    }
    if (timedOut || isAbortError(error)) {
      throw toError('Timeout', `Request timeout after ${timeoutMs}ms: ${url}`, { url, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw toError('Network', `Request to ${url} failed: ${message}`, { url, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface FetcherOptions {
  config: UpstreamConfig;
  logger: Logger;
  fetchFn?: FetchFn;
}

const fetchError: UpstreamErrorFactory<FetchError> = (kind, message, details) =>
  new FetchError(kind, message, details);

/**
 * Retrieves raw bytes from origin hosts. Never retries; that is the
 * pipeline's job.
 */
export class Fetcher {
  private readonly config: UpstreamConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(options: FetcherOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * GET the origin URL with the configured Referer, timeout and size cap
   *
   * @throws FetchError
   */
  async fetch(originUrl: string): Promise<UpstreamPayload> {
    this.logger.info({ url: originUrl }, `Fetching ${originUrl}`);
    const startTime = Date.now();

    try {
      const payload = await callUpstream(
        this.fetchFn,
        {
          url: originUrl,
          referer: this.config.referer,
          userAgent: this.config.userAgent,
          timeoutMs: this.config.timeoutMs,
          maxBytes: this.config.maxBytes,
        },
        fetchError
      );
      this.logger.debug(
        { url: originUrl, size: payload.bytes.byteLength, ms: Date.now() - startTime },
        `Fetched ${originUrl}`
      );
      return payload;
    } catch (error) {
      this.logger.warn({ url: originUrl, err: error }, `Fetch failed for ${originUrl}`);
      throw error;
    }
  }
}
