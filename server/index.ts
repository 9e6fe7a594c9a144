/**
 * Companion server entry point.
 *
 * Every line typed on stdin is pushed to connected clients as a
 * transcription; lines starting with `/notice ` go out as system notices.
 */

import { createInterface } from 'readline';
import { ConfigError, loadServerConfig } from '../src/config.js';
import type { ServerConfig } from '../src/config.js';
import { createLogger } from '../src/lib/logger.js';
import { CompanionServer } from './CompanionServer.js';

const NOTICE_PREFIX = '/notice ';

function readConfig(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const logger = createLogger('Server', config.logLevel);
const server = new CompanionServer({
  port: config.port,
  handshakeAck: config.handshakeAck,
  logger,
});

const input = createInterface({ input: process.stdin });
input.on('line', (line) => {
  const text = line.trim();
  if (!text) return;

  const delivered = text.startsWith(NOTICE_PREFIX)
    ? server.notice(text.slice(NOTICE_PREFIX.length))
    : server.broadcast(text);
  logger.info(`Broadcast to ${delivered} client(s): ${text.substring(0, 50)}`);
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down...`);
  input.close();
  server
    .shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

server.start().catch((error: unknown) => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
