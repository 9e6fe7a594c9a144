#!/usr/bin/env node
/**
 * Teleprompter Link - terminal entry point
 *
 * Connects to the companion service and prints each new transcription.
 */

import { ConfigError, loadConfig, toClientConfig } from './config.js';
import type { RealtimeConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { RealtimeClient, describeConnectionState } from './lib/websocket/client.js';

function readConfig(): RealtimeConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();

  const logger = createLogger('Main', config.logLevel);
  const client = new RealtimeClient(toClientConfig(config, createLogger('Client', config.logLevel)));

  client.onStateChange((state, previousState) => {
    logger.info(
      `Connection: ${describeConnectionState(previousState)} -> ${describeConnectionState(state)}`
    );
  });

  client.subscribe((snapshot, previous) => {
    if (snapshot.text !== previous.text) {
      process.stdout.write(`${snapshot.text}\n`);
    }
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, disconnecting...`);
    client.disconnect();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info(`Connecting to ${config.url} as ${config.clientName}`);
  client.connect();
}

main();
