/**
 * Realtime error taxonomy.
 *
 * None of these escape the client: transport errors drive the reconnect
 * policy, decode and protocol errors are logged and the frame is dropped.
 */

export type RealtimeErrorKind = 'transport' | 'decode' | 'protocol';

export abstract class RealtimeError extends Error {
  abstract readonly kind: RealtimeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection refused, DNS failure, abrupt or remote close */
export class TransportError extends RealtimeError {
  readonly kind = 'transport' as const;

  constructor(
    message: string,
    readonly code?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Invalid UTF-8, invalid JSON, or a missing required field */
export class DecodeError extends RealtimeError {
  readonly kind = 'decode' as const;
}

/** Well-formed frame with an unrecognized `type` tag */
export class ProtocolError extends RealtimeError {
  readonly kind = 'protocol' as const;

  constructor(readonly messageType: string | null) {
    super(
      messageType === null
        ? 'Message has no type tag'
        : `Unknown message type: ${messageType}`
    );
  }
}
