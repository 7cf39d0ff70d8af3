/**
 * Process configuration
 *
 * Read once at startup from the environment, frozen, and handed to each
 * component's constructor. Nothing reads process.env after loadConfig().
 *
 * Rescale mode is chosen by which endpoints are present:
 *   - IMAGE_RESCALE_URL set         : "generic" (one endpoint for every variant)
 *   - IMAGE_RESCALE_URL_<Variant>   : "per-variant"
 */

import { parseLogLevels, type LogLevels } from './logger';
import type { Env, Variant } from './types';
import { parseFileSize } from './utils';

export type RescaleMode = 'generic' | 'per-variant';

/**
 * What per-variant endpoints receive: the origin URL appended to the
 * template, or the origin bytes POSTed to it.
 */
export type ForwardMode = 'url' | 'bytes';

export type VariantEndpoints = Readonly<Partial<Record<Variant, string>>>;

export interface RescaleConfig {
  mode: RescaleMode;
  forward: ForwardMode;
  endpoints: VariantEndpoints;
  timeoutMs: number;
}

export interface UpstreamConfig {
  referer?: string;
  userAgent: string;
  timeoutMs: number;
  maxBytes: number;
}

export interface RetryConfig {
  retries: number;
  baseDelayMs: number;
}

export interface CacheConfig {
  maxBytes: number;
  /** 0 = no entry limit */
  maxEntries: number;
  /** 0 = entries never expire */
  maxAgeMs: number;
}

export interface Config {
  port: number;
  host: string;
  debug: boolean;
  origin: UpstreamConfig;
  rescale: RescaleConfig;
  retry: RetryConfig;
  cache: CacheConfig;
  magicCacheEntries: number;
  logLevels: LogLevels;
  warnings: readonly string[];
}

export const DEFAULT_PORT = 3030;
export const DEFAULT_USER_AGENT = 'ImageRescaleProxy/1.0';

function parseInteger(name: string, value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid ${name}: ${value} (expected an integer >= ${min})`);
  }
  return parsed;
}

function parseSize(name: string, value: string | undefined, fallback: string): number {
  try {
    return parseFileSize(value && value.trim() !== '' ? value : fallback);
  } catch {
    throw new Error(`Invalid ${name}: ${value}`);
  }
}

function parseForwardMode(value: string | undefined): ForwardMode {
  const mode = (value || 'url').trim().toLowerCase();
  if (mode !== 'url' && mode !== 'bytes') {
    throw new Error(`Invalid IMAGE_RESCALE_FORWARD: ${value} (expected "url" or "bytes")`);
  }
  return mode;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function buildRescaleConfig(env: Env, warnings: string[]): RescaleConfig {
  const timeoutMs = parseInteger('RESCALE_TIMEOUT', env.RESCALE_TIMEOUT, 30000, 1);
  const forward = parseForwardMode(env.IMAGE_RESCALE_FORWARD);

  const generic = nonEmpty(env.IMAGE_RESCALE_URL);
  const thumbnail = nonEmpty(env.IMAGE_RESCALE_URL_Thumbnail);
  const large = nonEmpty(env.IMAGE_RESCALE_URL_Large);

  if (generic) {
    if (thumbnail || large) {
      warnings.push('IMAGE_RESCALE_URL is set; per-variant IMAGE_RESCALE_URL_* endpoints are ignored');
    }
    return {
      mode: 'generic',
      forward: 'url',
      endpoints: Object.freeze({ Thumbnail: generic, Large: generic, Generic: generic }),
      timeoutMs,
    };
  }

  if (!thumbnail && !large) {
    throw new Error(
      'No rescale endpoint configured: set IMAGE_RESCALE_URL or IMAGE_RESCALE_URL_Thumbnail / IMAGE_RESCALE_URL_Large'
    );
  }

  const endpoints: Partial<Record<Variant, string>> = {};
  if (thumbnail) endpoints.Thumbnail = thumbnail;
  if (large) endpoints.Large = large;

  return {
    mode: 'per-variant',
    forward,
    endpoints: Object.freeze(endpoints),
    timeoutMs,
  };
}

/**
 * Build the immutable configuration from environment variables
 *
 * @throws Error if no rescale endpoint is set or any value is malformed
 */
export function loadConfig(env: Env): Readonly<Config> {
  const warnings: string[] = [];
  const debug = env.DEBUG === 'true' || env.DEBUG === '1';

  const config: Config = {
    port: parseInteger('PORT', env.PORT, DEFAULT_PORT, 1),
    host: nonEmpty(env.HOST) ?? '127.0.0.1',
    debug,
    origin: Object.freeze({
      referer: nonEmpty(env.REFERER),
      userAgent: nonEmpty(env.ORIGIN_USER_AGENT) ?? DEFAULT_USER_AGENT,
      timeoutMs: parseInteger('FETCH_TIMEOUT', env.FETCH_TIMEOUT, 30000, 1),
      maxBytes: parseSize('MAX_FILE_SIZE', env.MAX_FILE_SIZE, '50MB'),
    }),
    rescale: Object.freeze(buildRescaleConfig(env, warnings)),
    retry: Object.freeze({
      retries: parseInteger('RETRY_ATTEMPTS', env.RETRY_ATTEMPTS, 2),
      baseDelayMs: parseInteger('RETRY_BASE_DELAY', env.RETRY_BASE_DELAY, 200),
    }),
    cache: Object.freeze({
      maxBytes: parseSize('CACHE_MAX_SIZE', env.CACHE_MAX_SIZE, '512MB'),
      maxEntries: parseInteger('CACHE_MAX_ENTRIES', env.CACHE_MAX_ENTRIES, 0),
      maxAgeMs: parseInteger('CACHE_MAX_AGE', env.CACHE_MAX_AGE, 0) * 1000,
    }),
    magicCacheEntries: parseInteger('MAGIC_CACHE_ENTRIES', env.MAGIC_CACHE_ENTRIES, 10000, 1),
    logLevels: parseLogLevels(env.LOG_LEVEL, debug ? 'debug' : 'info'),
    warnings: Object.freeze(warnings),
  };

  return Object.freeze(config);
}
