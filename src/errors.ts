import type { FailureReason, Frame } from './types.js';

export type ProtocolErrorCode =
  | 'truncated'
  | 'unsupported_version'
  | 'malformed_header'
  | 'decompression_failed'
  | 'malformed_payload';

/**
 * Failure to decode one inbound frame. Returned as a value by the codec, never thrown,
 * so the consumer can log and skip the frame.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  readonly frame?: Frame;

  constructor(code: ProtocolErrorCode, message: string, options?: { frame?: Frame; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ProtocolError';
    this.code = code;
    this.frame = options?.frame;
  }
}

export type StreamingErrorCode = FailureReason | 'invalid_state';

export class StreamingError extends Error {
  readonly code: StreamingErrorCode;
  readonly serverCode?: number;

  constructor(code: StreamingErrorCode, message: string, options?: { serverCode?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StreamingError';
    this.code = code;
    this.serverCode = options?.serverCode;
  }
}

export function isStreamingError(error: unknown): error is StreamingError {
  return error instanceof StreamingError;
}

export function toStreamingError(error: unknown, fallback: FailureReason = 'transport_closed'): StreamingError {
  if (error instanceof StreamingError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StreamingError(fallback, message, { cause: error });
}
