#!/usr/bin/env node
/**
 * Process entry: configuration, loggers, server
 */

import { loadConfig, type Config } from './config';
import { createApp, createDeps } from './index';
import { createLoggers, parseLogLevels, type Loggers } from './logger';
import { buildServer, startServer } from './server';

function configure(): { config: Readonly<Config>; loggers: Loggers } {
  try {
    const config = loadConfig(process.env);
    return { config, loggers: createLoggers(config.logLevels) };
  } catch (error) {
    createLoggers(parseLogLevels('info')).imgs.fatal({ err: error }, 'Invalid configuration');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const { config, loggers } = configure();

  for (const warning of config.warnings) {
    loggers.imgs.warn(warning);
  }

  const app = createApp(createDeps(config, loggers));
  const server = buildServer({ app, logger: loggers.http });

  const shutdown = (signal: string) => {
    loggers.http.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        loggers.http.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const address = await startServer(server, config.host, config.port);
  loggers.imgs.info(
    { mode: config.rescale.mode, forward: config.rescale.forward, referer: Boolean(config.origin.referer) },
    `Serving rescaled images on ${address}`
  );
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
