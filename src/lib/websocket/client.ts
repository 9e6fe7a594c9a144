/**
 * Realtime Client
 *
 * Keeps one WebSocket link to the companion service alive, reconnecting on
 * failure, and republishes decoded frames as typed messages and as an
 * observable `{ text, connected }` snapshot.
 */

import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { ObservableState } from '../state/ObservableState.js';
import type {
  RealtimeSnapshot,
  RealtimeStateSource,
  SnapshotListener,
} from '../state/ObservableState.js';
import { ProtocolError, TransportError } from './errors.js';
import {
  CloseCode,
  DEFAULT_CLIENT_NAME,
  HANDSHAKE_ACK,
  createHandshake,
  decodeFrame,
  serializeMessage,
} from './protocol.js';
import type {
  InboundMessage,
  InboundMessageKind,
  MessageOfKind,
  OutboundMessage,
  RawFrame,
} from './protocol.js';
import { fixedDelay } from './reconnect.js';
import type { ReconnectPolicy } from './reconnect.js';
import { createWsTransport } from './transport.js';
import type { Transport, TransportFactory, TransportHandlers } from './transport.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface ClientConfig {
  url: string;
  /** Identity sent in the handshake */
  clientName?: string;
  /** System notice that marks the connection as live */
  handshakeAck?: string;
  autoReconnect?: boolean;
  reconnectPolicy?: ReconnectPolicy;
  transport?: TransportFactory;
  logger?: Logger;
}

export type MessageHandler<T extends InboundMessage = InboundMessage> = (message: T) => void;
export type StateChangeHandler = (state: ConnectionState, previousState: ConnectionState) => void;

type HandlerRegistry = {
  [K in InboundMessageKind]: Set<MessageHandler<MessageOfKind<K>>>;
};

const RECONNECT_DELAY = 2000;

const DEFAULT_CONFIG: Required<Omit<ClientConfig, 'url' | 'logger'>> = {
  clientName: DEFAULT_CLIENT_NAME,
  handshakeAck: HANDSHAKE_ACK,
  autoReconnect: true,
  reconnectPolicy: fixedDelay(RECONNECT_DELAY),
  transport: createWsTransport,
};

/** Human-readable label for a connection state */
export function describeConnectionState(state: ConnectionState): string {
  switch (state) {
    case 'connected':
      return 'Connected';
    case 'connecting':
      return 'Connecting...';
    case 'reconnecting':
      return 'Reconnecting...';
    default:
      return 'Disconnected';
  }
}

export class RealtimeClient implements RealtimeStateSource {
  private config: Required<Omit<ClientConfig, 'logger'>>;
  private logger: Logger;
  private transport: Transport | null = null;
  private connectionSeq = 0;
  private activeConnection: number | null = null;
  private state: ConnectionState = 'disconnected';
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private error: TransportError | null = null;
  private store: ObservableState;

  private messageHandlers: HandlerRegistry = {
    transcription: new Set(),
    system: new Set(),
    unknown: new Set(),
  };
  private wildcardHandlers: Set<MessageHandler> = new Set();
  private stateChangeHandlers: Set<StateChangeHandler> = new Set();

  constructor(config: ClientConfig) {
    const { logger, ...rest } = config;
    this.config = { ...DEFAULT_CONFIG, ...rest };
    this.logger = logger ?? createLogger('Client');
    this.store = new ObservableState(this.logger);
  }

  /** Current connection state */
  get connectionState(): ConnectionState {
    return this.state;
  }

  /** Retries scheduled since the last successful handshake */
  get attempts(): number {
    return this.reconnectAttempts;
  }

  /** Most recent transport failure, if any */
  get lastError(): TransportError | null {
    return this.error;
  }

  readonly getSnapshot = (): RealtimeSnapshot => this.store.getSnapshot();

  readonly subscribe = (listener: SnapshotListener): (() => void) =>
    this.store.subscribe(listener);

  /** Open a connection unless one is already being made or is live */
  connect(): void {
    if (this.state === 'connected' || this.state === 'connecting') {
      return;
    }

    this.clearReconnectTimer();
    this.setState('connecting');

    const connectionId = ++this.connectionSeq;
    this.activeConnection = connectionId;

    try {
      this.transport = this.config.transport(this.config.url, this.createHandlers(connectionId));
    } catch (error) {
      this.logger.error('Connection error:', error);
      this.handleConnectionFailure(
        new TransportError(`Could not open ${this.config.url}`, undefined, { cause: error })
      );
    }
  }

  /** Close the connection and stop reconnecting */
  disconnect(): void {
    this.clearReconnectTimer();
    this.reconnectAttempts = 0;

    const transport = this.transport;
    this.transport = null;
    this.activeConnection = null;

    if (transport) {
      transport.close(CloseCode.NORMAL, 'Client disconnected');
    }

    this.store.update({ connected: false });
    this.setState('disconnected');
  }

  /** Best-effort send; returns false when there is no live connection */
  send(message: OutboundMessage): boolean {
    if (this.state !== 'connected' || !this.transport) {
      this.logger.warn('Cannot send message: not connected');
      return false;
    }

    return this.write(this.transport, message);
  }

  /** Subscribe to decoded messages of one kind */
  on<K extends InboundMessageKind>(kind: K, handler: MessageHandler<MessageOfKind<K>>): () => void {
    const handlers: Set<MessageHandler<MessageOfKind<K>>> = this.messageHandlers[kind];
    handlers.add(handler);

    return () => {
      handlers.delete(handler);
    };
  }

  /** Subscribe to every decoded message */
  onMessage(handler: MessageHandler): () => void {
    this.wildcardHandlers.add(handler);
    return () => {
      this.wildcardHandlers.delete(handler);
    };
  }

  /** Subscribe to connection state changes */
  onStateChange(handler: StateChangeHandler): () => void {
    this.stateChangeHandlers.add(handler);
    return () => {
      this.stateChangeHandlers.delete(handler);
    };
  }

  private createHandlers(connectionId: number): TransportHandlers {
    const isCurrent = () => this.activeConnection === connectionId;

    return {
      onOpen: () => {
        if (!isCurrent() || !this.transport) return;
        this.logger.info(`Transport open, identifying as ${this.config.clientName}`);
        this.write(this.transport, createHandshake(this.config.clientName));
      },
      onMessage: (data) => {
        if (!isCurrent()) return;
        this.handleFrame(data);
      },
      onClose: (code, reason) => {
        if (!isCurrent()) return;
        this.logger.info(`Connection closed: ${code} ${reason}`);
        const detail = reason ? `${code} ${reason}` : `${code}`;
        this.handleConnectionFailure(new TransportError(`Connection closed (${detail})`, code));
      },
      onError: (error) => {
        if (!isCurrent()) return;
        this.logger.error('Socket error:', error.message);
        const transport = this.transport;
        this.handleConnectionFailure(
          new TransportError(error.message, undefined, { cause: error })
        );
        transport?.close(CloseCode.NORMAL, 'Transport error');
      },
    };
  }

  private write(transport: Transport, message: OutboundMessage): boolean {
    try {
      transport.send(serializeMessage(message));
      return true;
    } catch (error) {
      this.logger.error('Send failed:', error);
      return false;
    }
  }

  private handleFrame(data: RawFrame): void {
    const result = decodeFrame(data);
    if (!result.ok) {
      this.logger.warn(`Dropped frame: ${result.error.message}`);
      return;
    }

    const msg = result.message;
    switch (msg.kind) {
      case 'transcription':
        this.store.update({ text: msg.text });
        this.logger.debug(`Transcription: ${msg.text}`);
        this.dispatch(this.messageHandlers.transcription, msg);
        break;

      case 'system':
        if (msg.message === this.config.handshakeAck) {
          this.handleHandshakeAck();
        } else {
          this.logger.info(`System notice: ${msg.message}`);
        }
        this.dispatch(this.messageHandlers.system, msg);
        break;

      case 'unknown':
        this.logger.warn(new ProtocolError(msg.type).message);
        this.dispatch(this.messageHandlers.unknown, msg);
        break;
    }

    this.dispatch(this.wildcardHandlers, msg);
  }

  private handleHandshakeAck(): void {
    if (this.state === 'connected') {
      return;
    }

    this.reconnectAttempts = 0;
    this.store.update({ connected: true });
    this.setState('connected');
    this.logger.info(`Connected to ${this.config.url}`);
  }

  private dispatch<T extends InboundMessage>(handlers: Set<MessageHandler<T>>, msg: T): void {
    for (const handler of handlers) {
      try {
        handler(msg);
      } catch (error) {
        this.logger.error(`Handler error for ${msg.kind}:`, error);
      }
    }
  }

  private handleConnectionFailure(error: TransportError): void {
    this.transport = null;
    this.activeConnection = null;
    this.error = error;
    this.store.update({ connected: false });

    if (!this.config.autoReconnect) {
      this.setState('disconnected');
      return;
    }

    this.reconnectAttempts++;
    const delay = this.config.reconnectPolicy.nextDelay(this.reconnectAttempts);
    if (delay === null) {
      this.logger.error(`Giving up after ${this.reconnectAttempts - 1} reconnect attempts`);
      this.setState('disconnected');
      return;
    }

    this.logger.info(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);
    this.setState('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(newState: ConnectionState): void {
    if (this.state === newState) return;

    const previousState = this.state;
    this.state = newState;

    for (const handler of this.stateChangeHandlers) {
      try {
        handler(newState, previousState);
      } catch (error) {
        this.logger.error('State change handler error:', error);
      }
    }
  }
}
