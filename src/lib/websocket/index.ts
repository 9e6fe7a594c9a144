/**
 * WebSocket Module
 *
 * Client-side realtime link to the companion service.
 */

export * from './errors.js';
export * from './protocol.js';
export * from './reconnect.js';
export * from './transport.js';
export * from './client.js';
