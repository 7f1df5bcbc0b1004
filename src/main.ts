#!/usr/bin/env node
import { loadConfig, type BridgeConfig } from './config/env.js';
import { ConfigError, errorMessage } from './lib/errors/bridge-errors.js';
import { logger } from './lib/logger/structured-logger.js';
import { ConnectionManager } from './infra/websocket/connection-manager.js';
import { OutputWriter } from './services/output/output-writer.js';
import { SlideFetcher } from './services/slides/slide-fetcher.js';
import { SlideProcessor } from './services/slides/slide-processor.js';

function readConfig(envFile: string | undefined): BridgeConfig | undefined {
  try {
    return loadConfig({ envFile });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ event: 'config_invalid', issues: err.issues }, `Exiting due to invalid configuration: ${err.message}`);
      return undefined;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = readConfig(process.argv[2]);
  if (!config) return 1;

  logger.info({
    event: 'bridge_starting',
    address: config.address,
    subscribePath: config.subscribePath,
    retryDelayMs: config.retryDelayMs,
    titleFile: config.titleFile,
    verseFile: config.verseFile
  }, 'Starting OpenSong bridge');

  const writer = new OutputWriter({ titleFile: config.titleFile, verseFile: config.verseFile });
  try {
    await writer.clear();
  } catch (err) {
    logger.error({ event: 'output_clear_failed', error: errorMessage(err) }, 'Could not blank output files at startup');
  }

  const fetcher = new SlideFetcher({ baseUrl: config.apiBaseUrl, timeoutMs: config.fetchTimeoutMs });
  const manager = new ConnectionManager(
    {
      wsUrl: config.wsUrl,
      subscribePath: config.subscribePath,
      retryDelayMs: config.retryDelayMs,
      connectTimeoutMs: config.connectTimeoutMs
    },
    new SlideProcessor(fetcher, writer)
  );

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ event: 'shutdown', signal }, `Received ${signal}. Exiting ...`);
    manager.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await manager.run();
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ event: 'bridge_crashed', err }, 'Unexpected error, exiting');
    process.exitCode = 1;
  }
);
