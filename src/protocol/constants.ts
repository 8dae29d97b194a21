import { COMPRESSION_KINDS, MESSAGE_TYPES, SERIALIZATION_KINDS } from '../types.js';
import type { CompressionKind, MessageType, SerializationKind } from '../types.js';

export const PROTOCOL_VERSION = 0b0001;
/** Header length in 4-byte words. */
export const HEADER_WORDS = 0b0001;
export const HEADER_BYTES = HEADER_WORDS * 4;

export const FLAG_HAS_SEQUENCE = 0b0001;
export const FLAG_LAST = 0b0010;
export const FLAG_HAS_EVENT = 0b0100;

export const MESSAGE_TYPE_CODES: Record<MessageType, number> = {
  full_request: 0b0001,
  audio_only_request: 0b0010,
  full_response: 0b1001,
  error_response: 0b1111,
};

export const SERIALIZATION_CODES: Record<SerializationKind, number> = {
  raw: 0b0000,
  json: 0b0001,
};

export const COMPRESSION_CODES: Record<CompressionKind, number> = {
  none: 0b0000,
  gzip: 0b0001,
};

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

function reverse<K extends string>(kinds: readonly K[], table: Record<K, number>): ReadonlyMap<number, K> {
  return new Map(kinds.map((kind) => [table[kind], kind]));
}

export const MESSAGE_TYPE_BY_CODE = reverse(MESSAGE_TYPES, MESSAGE_TYPE_CODES);
export const SERIALIZATION_BY_CODE = reverse(SERIALIZATION_KINDS, SERIALIZATION_CODES);
export const COMPRESSION_BY_CODE = reverse(COMPRESSION_KINDS, COMPRESSION_CODES);
