/**
 * WebSocket Message Protocol
 *
 * Frames are JSON objects tagged by a `type` string. The companion service
 * pushes transcriptions and system notices; the client sends a single
 * identifying handshake and, optionally, arbitrary JSON objects after it.
 */

import { DecodeError } from './errors.js';

/** Handshake acknowledgment sent by the companion service */
export const HANDSHAKE_ACK = 'Connected to PAT Teleprompter';

/** Name the client identifies itself with unless configured otherwise */
export const DEFAULT_CLIENT_NAME = 'TeleprompterOverlay';

/** Tags the companion service sends */
export enum InboundMessageType {
  TRANSCRIPTION = 'transcription',
  SYSTEM = 'system',
}

/** Tags the client sends */
export enum OutboundMessageType {
  CONNECTION = 'connection',
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Any string-keyed JSON object, written as one text frame */
export type OutboundMessage = { [key: string]: JsonValue };

export interface TranscriptionMessage {
  kind: 'transcription';
  text: string;
  timestamp?: number;
}

export interface SystemNoticeMessage {
  kind: 'system';
  message: string;
  timestamp?: number;
}

export interface UnknownMessage {
  kind: 'unknown';
  /** The tag as received, or null when the frame had none */
  type: string | null;
  raw: string;
}

export type InboundMessage = TranscriptionMessage | SystemNoticeMessage | UnknownMessage;

export type InboundMessageKind = InboundMessage['kind'];

export type MessageOfKind<K extends InboundMessageKind> = Extract<InboundMessage, { kind: K }>;

/** A frame as delivered by the transport: text, or raw bytes for binary frames */
export type RawFrame = string | Uint8Array;

export type DecodeResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; error: DecodeError };

const utf8 = new TextDecoder('utf-8', { fatal: true });

export type ParseResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: DecodeError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a text frame that must hold a single JSON object */
export function parseJsonObject(text: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: new DecodeError('Frame is not valid JSON', { cause: error }) };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: new DecodeError('Frame is not a JSON object') };
  }
  return { ok: true, value: parsed };
}

function readTimestamp(record: Record<string, unknown>): { timestamp?: number } {
  return typeof record.timestamp === 'number' ? { timestamp: record.timestamp } : {};
}

/** Decode a binary frame as UTF-8, or null when the bytes are not valid UTF-8 */
export function decodeText(data: RawFrame): string | null {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return utf8.decode(data);
  } catch {
    return null;
  }
}

/** Parse raw WebSocket data into a typed message */
export function decodeFrame(data: RawFrame): DecodeResult {
  const text = decodeText(data);
  if (text === null) {
    return { ok: false, error: new DecodeError('Binary frame is not valid UTF-8') };
  }

  const object = parseJsonObject(text);
  if (!object.ok) {
    return object;
  }
  const parsed = object.value;

  switch (parsed.type) {
    case InboundMessageType.TRANSCRIPTION:
      if (typeof parsed.text !== 'string') {
        return { ok: false, error: new DecodeError('Transcription frame has no text') };
      }
      return {
        ok: true,
        message: { kind: 'transcription', text: parsed.text, ...readTimestamp(parsed) },
      };

    case InboundMessageType.SYSTEM:
      if (typeof parsed.message !== 'string') {
        return { ok: false, error: new DecodeError('System frame has no message') };
      }
      return {
        ok: true,
        message: { kind: 'system', message: parsed.message, ...readTimestamp(parsed) },
      };

    default:
      return {
        ok: true,
        message: {
          kind: 'unknown',
          type: typeof parsed.type === 'string' ? parsed.type : null,
          raw: text,
        },
      };
  }
}

/** Build the identifying handshake sent once the transport opens */
export function createHandshake(clientName: string): OutboundMessage {
  return { type: OutboundMessageType.CONNECTION, client: clientName };
}

/** Serialize a message for transmission */
export function serializeMessage(msg: OutboundMessage): string {
  return JSON.stringify(msg);
}

/** Connection close codes */
export enum CloseCode {
  NORMAL = 1000,
  GOING_AWAY = 1001,
  ABNORMAL = 1006,
}
