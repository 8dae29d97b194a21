import { gunzipSync, gzipSync } from 'node:zlib';
import { ProtocolError } from '../errors.js';
import type { CompressionKind, Frame, SerializationKind } from '../types.js';

export type PayloadResult<T> = { ok: true; value: T } | { ok: false; error: ProtocolError };

export type PayloadBody = Buffer | object;

export function serialize(body: PayloadBody, kind: SerializationKind): Buffer {
  if (kind === 'raw') {
    if (!Buffer.isBuffer(body)) {
      throw new TypeError('raw serialization expects a Buffer body');
    }
    return body;
  }
  if (Buffer.isBuffer(body)) {
    throw new TypeError('json serialization expects a structured body');
  }
  return Buffer.from(JSON.stringify(body), 'utf8');
}

export function deserialize(bytes: Buffer, kind: 'raw'): PayloadResult<Buffer>;
export function deserialize(bytes: Buffer, kind: 'json'): PayloadResult<unknown>;
export function deserialize(bytes: Buffer, kind: SerializationKind): PayloadResult<unknown>;
export function deserialize(bytes: Buffer, kind: SerializationKind): PayloadResult<unknown> {
  if (kind === 'raw') {
    return { ok: true, value: bytes };
  }
  if (bytes.length === 0) {
    return { ok: true, value: null };
  }
  try {
    return { ok: true, value: JSON.parse(bytes.toString('utf8')) };
  } catch (err) {
    return {
      ok: false,
      error: new ProtocolError('malformed_payload', `invalid JSON payload: ${(err as Error).message}`, { cause: err }),
    };
  }
}

export function compress(bytes: Buffer): Buffer {
  return gzipSync(bytes);
}

export function decompress(bytes: Buffer): PayloadResult<Buffer> {
  try {
    return { ok: true, value: gunzipSync(bytes) };
  } catch (err) {
    return {
      ok: false,
      error: new ProtocolError('decompression_failed', `gzip decompression failed: ${(err as Error).message}`, {
        cause: err,
      }),
    };
  }
}

/** Outbound: serialize, then compress when the frame declares gzip. */
export function encodePayload(body: PayloadBody, serialization: SerializationKind, compression: CompressionKind): Buffer {
  const bytes = serialize(body, serialization);
  return compression === 'gzip' ? compress(bytes) : bytes;
}

/**
 * Inbound: undo the frame's declared compression, then its serialization. Errors are
 * returned with the frame attached so the caller can log what it skipped.
 */
export function decodePayload(frame: Frame): PayloadResult<unknown> {
  let bytes = frame.payload;
  if (frame.compression === 'gzip' && bytes.length > 0) {
    const inflated = decompress(bytes);
    if (!inflated.ok) {
      return { ok: false, error: new ProtocolError(inflated.error.code, inflated.error.message, { frame, cause: inflated.error.cause }) };
    }
    bytes = inflated.value;
  }
  const decoded = deserialize(bytes, frame.serialization);
  if (!decoded.ok) {
    return { ok: false, error: new ProtocolError(decoded.error.code, decoded.error.message, { frame, cause: decoded.error.cause }) };
  }
  return decoded;
}
