/**
 * Frame encoding and decoding for the recognition service's binary protocol:
 *
 * | ver(4b) hdr(4b) | type(4b) flags(4b) | ser(4b) comp(4b) | reserved(1B) |
 * | [sequence int32] | [event int32] | [error code uint32] | length uint32 | payload |
 *
 * `hdr` is the header length in 4-byte words. The optional fields are present when
 * the matching flag bit is set (sequence, event) or the frame is an error response.
 * All numeric fields are big-endian.
 */

import { ProtocolError } from '../errors.js';
import type { Frame } from '../types.js';
import {
  COMPRESSION_BY_CODE,
  COMPRESSION_CODES,
  FLAG_HAS_EVENT,
  FLAG_HAS_SEQUENCE,
  FLAG_LAST,
  HEADER_BYTES,
  HEADER_WORDS,
  MESSAGE_TYPE_BY_CODE,
  MESSAGE_TYPE_CODES,
  PROTOCOL_VERSION,
  SERIALIZATION_BY_CODE,
  SERIALIZATION_CODES,
  isInt32,
  isUint32,
} from './constants.js';

const KNOWN_FLAGS = FLAG_HAS_SEQUENCE | FLAG_LAST | FLAG_HAS_EVENT;

export type DecodeResult = { ok: true; frame: Frame } | { ok: false; error: ProtocolError };

function frameFlags(frame: Frame): number {
  let flags = 0;
  if (frame.sequence !== null) flags |= FLAG_HAS_SEQUENCE;
  if (frame.last || (frame.sequence !== null && frame.sequence < 0)) flags |= FLAG_LAST;
  if (frame.event !== undefined) flags |= FLAG_HAS_EVENT;
  return flags;
}

/**
 * Encode a frame for transmission. Throws `RangeError` for values the header cannot
 * carry; those are programming errors rather than wire conditions.
 */
export function encodeFrame(frame: Frame): Buffer {
  const { sequence, event, payload } = frame;
  if (sequence !== null && (sequence === 0 || !isInt32(sequence))) {
    throw new RangeError(`sequence must be a non-zero int32, got ${sequence}`);
  }
  if (event !== undefined && !isInt32(event)) {
    throw new RangeError(`event must be an int32, got ${event}`);
  }
  const errorCode = frame.messageType === 'error_response' ? frame.errorCode : undefined;
  if (errorCode !== undefined && !isUint32(errorCode)) {
    throw new RangeError(`error code must be a uint32, got ${errorCode}`);
  }

  const size =
    HEADER_BYTES +
    (sequence !== null ? 4 : 0) +
    (event !== undefined ? 4 : 0) +
    (errorCode !== undefined ? 4 : 0) +
    4 +
    payload.length;
  const buffer = Buffer.alloc(size);

  buffer.writeUInt8((PROTOCOL_VERSION << 4) | HEADER_WORDS, 0);
  buffer.writeUInt8((MESSAGE_TYPE_CODES[frame.messageType] << 4) | frameFlags(frame), 1);
  buffer.writeUInt8((SERIALIZATION_CODES[frame.serialization] << 4) | COMPRESSION_CODES[frame.compression], 2);
  buffer.writeUInt8(0, 3);

  let offset = HEADER_BYTES;
  if (sequence !== null) offset = buffer.writeInt32BE(sequence, offset);
  if (event !== undefined) offset = buffer.writeInt32BE(event, offset);
  if (errorCode !== undefined) offset = buffer.writeUInt32BE(errorCode, offset);
  offset = buffer.writeUInt32BE(payload.length, offset);
  payload.copy(buffer, offset);

  return buffer;
}

function failure(code: ProtocolError['code'], message: string): DecodeResult {
  return { ok: false, error: new ProtocolError(code, message) };
}

/**
 * Decode one complete message. Never throws: every malformed input is reported as a
 * `ProtocolError` value.
 */
export function decodeFrame(bytes: Buffer): DecodeResult {
  if (bytes.length < HEADER_BYTES) {
    return failure('truncated', `frame too short: expected at least ${HEADER_BYTES} bytes, got ${bytes.length}`);
  }

  const byte0 = bytes.readUInt8(0);
  const byte1 = bytes.readUInt8(1);
  const byte2 = bytes.readUInt8(2);

  const version = byte0 >> 4;
  if (version !== PROTOCOL_VERSION) {
    return failure('unsupported_version', `unsupported protocol version: ${version}`);
  }
  const headerWords = byte0 & 0x0f;
  if (headerWords === 0) {
    return failure('malformed_header', 'header size is zero');
  }
  const messageType = MESSAGE_TYPE_BY_CODE.get(byte1 >> 4);
  if (!messageType) {
    return failure('malformed_header', `unknown message type: 0b${(byte1 >> 4).toString(2).padStart(4, '0')}`);
  }
  const flags = byte1 & 0x0f;
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    return failure('malformed_header', `unknown flag bits: 0b${flags.toString(2).padStart(4, '0')}`);
  }
  const serialization = SERIALIZATION_BY_CODE.get(byte2 >> 4);
  if (!serialization) {
    return failure('malformed_header', `unknown serialization: ${byte2 >> 4}`);
  }
  const compression = COMPRESSION_BY_CODE.get(byte2 & 0x0f);
  if (!compression) {
    return failure('malformed_header', `unknown compression: ${byte2 & 0x0f}`);
  }

  let offset = headerWords * 4;
  const need = (count: number, field: string): DecodeResult | null =>
    bytes.length < offset + count
      ? failure('truncated', `frame truncated reading ${field}: need ${offset + count} bytes, got ${bytes.length}`)
      : null;

  let sequence: number | null = null;
  if (flags & FLAG_HAS_SEQUENCE) {
    const short = need(4, 'sequence');
    if (short) return short;
    sequence = bytes.readInt32BE(offset);
    offset += 4;
  }

  let event: number | undefined;
  if (flags & FLAG_HAS_EVENT) {
    const short = need(4, 'event');
    if (short) return short;
    event = bytes.readInt32BE(offset);
    offset += 4;
  }

  let errorCode: number | undefined;
  if (messageType === 'error_response') {
    const short = need(4, 'error code');
    if (short) return short;
    errorCode = bytes.readUInt32BE(offset);
    offset += 4;
  }

  const shortLength = need(4, 'payload length');
  if (shortLength) return shortLength;
  const payloadLength = bytes.readUInt32BE(offset);
  offset += 4;
  const shortPayload = need(payloadLength, 'payload');
  if (shortPayload) return shortPayload;
  const payload = bytes.subarray(offset, offset + payloadLength);

  const base = {
    version,
    serialization,
    compression,
    sequence,
    last: (flags & FLAG_LAST) !== 0,
    ...(event !== undefined ? { event } : {}),
    payload,
  };

  if (messageType === 'error_response') {
    return { ok: true, frame: { ...base, messageType, errorCode: errorCode ?? 0 } };
  }
  return { ok: true, frame: { ...base, messageType } };
}
