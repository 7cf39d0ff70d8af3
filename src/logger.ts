/**
 * Per-subsystem loggers
 *
 * LOG_LEVEL takes either a bare level ("info") or a comma-separated list of
 * target overrides with an optional default: "warn,cache=debug,fetch=info".
 *
 * Targets:
 *   - imgs  : request handling and pipeline outcomes
 *   - cache : cache hits, fills and evictions
 *   - fetch : outbound calls to origins and the rescale service
 *   - http  : the HTTP server and access log
 */

import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export const LOG_TARGETS = ['imgs', 'cache', 'fetch', 'http'] as const;

export type LogTarget = (typeof LOG_TARGETS)[number];

export type LogLevel = Level | 'silent';

export type LogLevels = Record<LogTarget, LogLevel>;

export type Loggers = Record<LogTarget, Logger>;

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function isLogTarget(value: string): value is LogTarget {
  return LOG_TARGETS.some(target => target === value);
}

/**
 * Parse a LOG_LEVEL value into one level per target
 *
 * @throws Error on an unknown target or level
 */
export function parseLogLevels(value: string | undefined, fallback: LogLevel = 'info'): LogLevels {
  let defaultLevel = fallback;
  const overrides: Partial<LogLevels> = {};

  for (const part of (value ?? '').split(',').map(p => p.trim()).filter(p => p !== '')) {
    const eq = part.indexOf('=');
    if (eq === -1) {
      const level = part.toLowerCase();
      if (!isLogLevel(level)) {
        throw new Error(`Unknown log level: ${part}`);
      }
      defaultLevel = level;
      continue;
    }

    const target = part.substring(0, eq).trim();
    const level = part.substring(eq + 1).trim().toLowerCase();
    if (!isLogTarget(target)) {
      throw new Error(`Unknown log target: ${target}`);
    }
    if (!isLogLevel(level)) {
      throw new Error(`Unknown log level for ${target}: ${level}`);
    }
    overrides[target] = level;
  }

  return {
    imgs: overrides.imgs ?? defaultLevel,
    cache: overrides.cache ?? defaultLevel,
    fetch: overrides.fetch ?? defaultLevel,
    http: overrides.http ?? defaultLevel,
  };
}

/**
 * Build the root logger and one child per target. Each child carries
 * `target` in its bindings and its own level.
 */
export function createLoggers(levels: LogLevels, destination?: DestinationStream): Loggers {
  const options = { level: 'trace', base: null };
  const root = destination ? pino(options, destination) : pino(options);

  return {
    imgs: root.child({ target: 'imgs' }, { level: levels.imgs }),
    cache: root.child({ target: 'cache' }, { level: levels.cache }),
    fetch: root.child({ target: 'fetch' }, { level: levels.fetch }),
    http: root.child({ target: 'http' }, { level: levels.http }),
  };
}

/**
 * Loggers that discard everything
 */
export function createSilentLoggers(): Loggers {
  return createLoggers({ imgs: 'silent', cache: 'silent', fetch: 'silent', http: 'silent' });
}
