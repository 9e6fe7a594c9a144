/**
 * Environment configuration for the client and the companion server.
 */

import { isLogLevel } from './lib/logger.js';
import type { LogLevel, Logger } from './lib/logger.js';
import type { ClientConfig } from './lib/websocket/client.js';
import { DEFAULT_CLIENT_NAME, HANDSHAKE_ACK } from './lib/websocket/protocol.js';
import { fixedDelay } from './lib/websocket/reconnect.js';

export const DEFAULT_URL = 'ws://localhost:8765';
export const DEFAULT_PORT = 8765;
const DEFAULT_RECONNECT_DELAY = 2000;

export interface RealtimeConfig {
  url: string;
  clientName: string;
  handshakeAck: string;
  reconnectDelayMs: number;
  /** null means retry forever */
  maxReconnectAttempts: number | null;
  logLevel: LogLevel;
}

export interface ServerConfig {
  port: number;
  handshakeAck: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInteger(
  env: Env,
  key: string,
  problems: string[],
  { min }: { min: number }
): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${key} must be an integer >= ${min}, got "${raw}"`);
    return undefined;
  }
  return value;
}

function readLogLevel(env: Env, problems: string[]): LogLevel {
  const raw = readString(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(raw)) {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
    return 'info';
  }
  return raw;
}

function validateUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `WS_URL is not a valid URL: "${url}"`;
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    return `WS_URL must use ws: or wss:, got "${parsed.protocol}"`;
  }
  return null;
}

export function loadConfig(env: Env = process.env): RealtimeConfig {
  const problems: string[] = [];

  const url = readString(env, 'WS_URL', DEFAULT_URL);
  const urlProblem = validateUrl(url);
  if (urlProblem) {
    problems.push(urlProblem);
  }

  const config: RealtimeConfig = {
    url,
    clientName: readString(env, 'WS_CLIENT_NAME', DEFAULT_CLIENT_NAME),
    handshakeAck: readString(env, 'WS_HANDSHAKE_ACK', HANDSHAKE_ACK),
    reconnectDelayMs:
      readInteger(env, 'WS_RECONNECT_DELAY_MS', problems, { min: 0 }) ?? DEFAULT_RECONNECT_DELAY,
    maxReconnectAttempts: readInteger(env, 'WS_MAX_RECONNECT_ATTEMPTS', problems, { min: 1 }) ?? null,
    logLevel: readLogLevel(env, problems),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const problems: string[] = [];
  const port = readInteger(env, 'WS_PORT', problems, { min: 0 }) ?? DEFAULT_PORT;
  if (port > 65535) {
    problems.push(`WS_PORT must be at most 65535, got "${port}"`);
  }

  const config: ServerConfig = {
    port,
    handshakeAck: readString(env, 'WS_HANDSHAKE_ACK', HANDSHAKE_ACK),
    logLevel: readLogLevel(env, problems),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

export function toClientConfig(config: RealtimeConfig, logger?: Logger): ClientConfig {
  return {
    url: config.url,
    clientName: config.clientName,
    handshakeAck: config.handshakeAck,
    autoReconnect: true,
    reconnectPolicy: fixedDelay(config.reconnectDelayMs, config.maxReconnectAttempts ?? Infinity),
    logger,
  };
}
