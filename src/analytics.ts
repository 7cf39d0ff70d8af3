/**
 * Health and stats endpoints
 *
 * Only operational counters are exposed; endpoint URLs, the Referer and
 * other settings stay private.
 */

import type { CacheStore } from './cache';
import type { RescaleMode } from './config';
import type { MagicResolver } from './magic';
import type { ImagePipeline } from './pipeline';
import { formatBytes, jsonResponse } from './utils';

export const VERSION = '1.0.0';

export interface StatsSources {
  cache: CacheStore;
  pipeline: ImagePipeline;
  magic: MagicResolver;
  mode: RescaleMode;
  startedAt: number;
}

export function createHealthResponse(): Response {
  return jsonResponse({
    status: 'healthy',
    version: VERSION,
    timestamp: new Date().toISOString(),
  });
}

export function createStatsResponse(sources: StatsSources): Response {
  const cache = sources.cache.stats();
  const lookups = cache.hits + cache.misses;

  return jsonResponse({
    status: 'healthy',
    version: VERSION,
    mode: sources.mode,
    uptimeSeconds: Math.floor((Date.now() - sources.startedAt) / 1000),
    cache: {
      ...cache,
      size: formatBytes(cache.bytes),
      hitRate: lookups === 0 ? '0.0%' : `${((cache.hits / lookups) * 100).toFixed(1)}%`,
    },
    inFlight: sources.pipeline.inFlightCount(),
    magicUrls: sources.magic.size,
    endpoints: {
      health: '/health or /ping',
      stats: '/stats',
      image: '/{thumbnail|large|generic}/{image-url}',
      magic: '/magic/{thumbnail|large|generic}/{indirect-url}',
    },
    timestamp: new Date().toISOString(),
  });
}
