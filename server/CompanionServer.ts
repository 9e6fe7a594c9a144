/**
 * Companion Server
 *
 * Local stand-in for the transcription service: acknowledges each client
 * with the handshake notice and pushes transcription text to everyone.
 */

import { WebSocketServer, WebSocket as WS } from 'ws';
import { randomUUID } from 'crypto';
import type { RawData } from 'ws';
import { createLogger } from '../src/lib/logger.js';
import type { Logger } from '../src/lib/logger.js';
import {
  CloseCode,
  HANDSHAKE_ACK,
  InboundMessageType,
  OutboundMessageType,
  decodeText,
  parseJsonObject,
  serializeMessage,
} from '../src/lib/websocket/protocol.js';
import type { OutboundMessage } from '../src/lib/websocket/protocol.js';
import { toBuffer } from '../src/lib/websocket/transport.js';

const HEARTBEAT_INTERVAL = 30000; // 30 seconds

export interface CompanionServerOptions {
  port: number;
  host?: string;
  handshakeAck?: string;
  heartbeatInterval?: number;
  logger?: Logger;
}

interface ClientConnection {
  id: string;
  socket: WS;
  isAlive: boolean;
  connectedAt: number;
  clientName: string | null;
}

/** Seconds since the epoch, as the companion service stamps its frames */
function timestamp(): number {
  return Date.now() / 1000;
}

export class CompanionServer {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private options: Required<Omit<CompanionServerOptions, 'logger'>>;
  private logger: Logger;

  constructor(options: CompanionServerOptions) {
    const { logger, ...rest } = options;
    this.options = {
      host: 'localhost',
      handshakeAck: HANDSHAKE_ACK,
      heartbeatInterval: HEARTBEAT_INTERVAL,
      ...rest,
    };
    this.logger = logger ?? createLogger('Server');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Start listening; resolves to the bound port */
  start(): Promise<number> {
    if (this.wss) {
      return Promise.reject(new Error('Server already started'));
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.options.port, host: this.options.host });
      this.wss = wss;

      const onStartupError = (error: Error) => {
        this.wss = null;
        reject(error);
      };
      wss.once('error', onStartupError);

      wss.once('listening', () => {
        wss.off('error', onStartupError);
        wss.on('error', (error) => {
          this.logger.error('Server error:', error);
        });
        wss.on('connection', (socket) => this.handleConnection(socket));
        this.startHeartbeat();

        const address = wss.address();
        const port = typeof address === 'string' ? this.options.port : address.port;
        this.logger.info(`WebSocket server started on ws://${this.options.host}:${port}`);
        resolve(port);
      });
    });
  }

  /** Push a transcription to every connected client; returns how many received it */
  broadcast(text: string): number {
    return this.sendToAll({ type: InboundMessageType.TRANSCRIPTION, text, timestamp: timestamp() });
  }

  /** Push a system notice to every connected client */
  notice(message: string): number {
    return this.sendToAll({ type: InboundMessageType.SYSTEM, message, timestamp: timestamp() });
  }

  shutdown(): Promise<void> {
    this.stopHeartbeat();

    const wss = this.wss;
    this.wss = null;
    if (!wss) {
      return Promise.resolve();
    }

    for (const client of this.clients.values()) {
      client.socket.close(CloseCode.GOING_AWAY, 'Server shutting down');
    }
    this.clients.clear();

    return new Promise((resolve, reject) => {
      wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Server shut down');
        resolve();
      });
    });
  }

  private handleConnection(socket: WS): void {
    const client: ClientConnection = {
      id: randomUUID(),
      socket,
      isAlive: true,
      connectedAt: Date.now(),
      clientName: null,
    };

    this.clients.set(client.id, client);
    this.logger.info(`Client connected: ${client.id} (${this.clients.size} total)`);

    socket.on('message', (data, isBinary) => this.handleMessage(client, data, isBinary));
    socket.on('close', (code, reason) => this.handleDisconnect(client, code, reason.toString()));
    socket.on('error', (err) => {
      this.logger.error(`Client error (${client.id}):`, err.message);
    });
    socket.on('pong', () => {
      client.isAlive = true;
    });

    this.sendTo(client, {
      type: InboundMessageType.SYSTEM,
      message: this.options.handshakeAck,
      timestamp: timestamp(),
    });
  }

  private handleMessage(client: ClientConnection, data: RawData, isBinary: boolean): void {
    const bytes = toBuffer(data);
    const text = isBinary ? decodeText(new Uint8Array(bytes)) : bytes.toString('utf8');
    if (text === null) {
      this.logger.warn(`Dropped binary frame from ${client.id}`);
      return;
    }

    const result = parseJsonObject(text);
    if (!result.ok) {
      this.logger.warn(
        `Dropped message from ${client.id}: ${result.error.message}`,
        text.substring(0, 100)
      );
      return;
    }

    const parsed = result.value;
    if (parsed.type === OutboundMessageType.CONNECTION) {
      const name = typeof parsed.client === 'string' ? parsed.client : null;
      client.clientName = name;
      this.logger.info(`Client ${client.id} identified as ${name ?? 'anonymous'}`);
      return;
    }

    this.logger.info(`Received from ${client.clientName ?? client.id}:`, text.substring(0, 100));
  }

  private handleDisconnect(client: ClientConnection, code: number, reason: string): void {
    this.clients.delete(client.id);
    const seconds = Math.round((Date.now() - client.connectedAt) / 1000);
    this.logger.info(
      `Client disconnected: ${client.id} after ${seconds}s (code: ${code}, reason: ${reason})`
    );
  }

  private sendTo(client: ClientConnection, msg: OutboundMessage): boolean {
    if (client.socket.readyState !== WS.OPEN) {
      return false;
    }
    client.socket.send(serializeMessage(msg));
    return true;
  }

  private sendToAll(msg: OutboundMessage): number {
    let delivered = 0;
    for (const client of this.clients.values()) {
      if (this.sendTo(client, msg)) {
        delivered++;
      }
    }
    return delivered;
  }

  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (!client.isAlive) {
          this.logger.warn(`Client ${id} failed heartbeat, terminating`);
          client.socket.terminate();
          this.clients.delete(id);
          continue;
        }

        client.isAlive = false;
        client.socket.ping();
      }
    }, this.options.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }
}
