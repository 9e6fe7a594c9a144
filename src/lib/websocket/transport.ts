/**
 * Transport seam between the realtime client and the socket library.
 *
 * A factory opens one socket per call and reports its lifecycle through the
 * handlers. Handlers are never invoked before the factory returns.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { RawFrame } from './protocol.js';

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: RawFrame): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface Transport {
  send(data: string): void;
  close(code: number, reason: string): void;
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => Transport;

/** Flatten whatever `ws` hands a message listener into one buffer */
export function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.isBuffer(data) ? data : Buffer.from(data);
}

/** Default transport over the `ws` package */
export const createWsTransport: TransportFactory = (url, handlers) => {
  const socket = new WebSocket(url);

  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data, isBinary) => {
    const bytes = toBuffer(data);
    handlers.onMessage(isBinary ? new Uint8Array(bytes) : bytes.toString('utf8'));
  });
  socket.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  socket.on('error', (error) => handlers.onError(error));

  return {
    send(data) {
      socket.send(data, (error) => {
        if (error) {
          handlers.onError(error);
        }
      });
    },
    close(code, reason) {
      socket.close(code, reason);
    },
  };
};
