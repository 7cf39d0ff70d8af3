/**
 * Process environment consumed by loadConfig()
 */
export interface Env {
  PORT?: string;
  HOST?: string;
  REFERER?: string;
  IMAGE_RESCALE_URL?: string;
  IMAGE_RESCALE_URL_Thumbnail?: string;
  IMAGE_RESCALE_URL_Large?: string;
  IMAGE_RESCALE_FORWARD?: string;
  FETCH_TIMEOUT?: string;
  RESCALE_TIMEOUT?: string;
  MAX_FILE_SIZE?: string;
  ORIGIN_USER_AGENT?: string;
  RETRY_ATTEMPTS?: string;
  RETRY_BASE_DELAY?: string;
  CACHE_MAX_SIZE?: string;
  CACHE_MAX_ENTRIES?: string;
  CACHE_MAX_AGE?: string;
  MAGIC_CACHE_ENTRIES?: string;
  LOG_LEVEL?: string;
  DEBUG?: string;
}

export const VARIANTS = ['Thumbnail', 'Large', 'Generic'] as const;

/**
 * Named output size of an image
 */
export type Variant = (typeof VARIANTS)[number];

/**
 * Identifies exactly one cache slot
 */
export interface RequestKey {
  readonly originUrl: string;
  readonly variant: Variant;
}

/**
 * Rescaled image held by the cache store. Frozen on creation.
 */
export interface CacheEntry {
  readonly key: RequestKey;
  readonly bytes: Uint8Array;
  readonly contentType: string;
  readonly fetchedAt: number;
  readonly size: number;
  readonly etag: string;
}

/**
 * Raw upstream body with its content type
 */
export interface UpstreamPayload {
  bytes: Uint8Array;
  contentType: string;
}

/**
 * Input to the rescale service: the origin URL alone, or the bytes already
 * fetched from it.
 */
export type RescaleSource =
  | { kind: 'url'; originUrl: string }
  | { kind: 'bytes'; originUrl: string; bytes: Uint8Array; contentType: string };

export type CacheStatus = 'hit' | 'miss' | 'coalesced';

export interface ImageResult {
  entry: CacheEntry;
  status: CacheStatus;
}

/**
 * Parsed inbound image request
 */
export interface ParsedRequest {
  variant: Variant;
  sourceUrl: string;
  indirect: boolean;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  maxBytes: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}
