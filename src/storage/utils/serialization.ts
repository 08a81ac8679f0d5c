/**
 * Serialization utilities for stored values
 */

import { deflateSync, inflateSync } from 'zlib';

import { SerializationError, toError } from './error-handling';

/**
 * Two-method codec contract. Any object with both methods is accepted;
 * no base class is involved.
 */
export interface Serializer<V> {
  dumps(value: V): Buffer;
  loads(data: Buffer): V;
}

/** Leading byte of a compressed payload */
export const COMPRESSED_TAG = 0x5a; // 'Z'

/** Leading byte of an uncompressed payload */
export const RAW_TAG = 0x52; // 'R'

/**
 * Structural check used to reject non-conforming serializers at construction
 */
export function isSerializer(
  candidate: unknown
): candidate is Serializer<unknown> {
  if (
    (typeof candidate !== 'object' && typeof candidate !== 'function') ||
    candidate === null
  ) {
    return false;
  }
  return (
    'dumps' in candidate &&
    typeof candidate.dumps === 'function' &&
    'loads' in candidate &&
    typeof candidate.loads === 'function'
  );
}

function encodeJson<V>(value: V): Buffer {
  const text = JSON.stringify(value);
  if (text === undefined) {
    throw new SerializationError(
      `Value of type ${typeof value} is not JSON serializable`
    );
  }
  return Buffer.from(text, 'utf-8');
}

function decodeJson<V>(data: Buffer): V {
  try {
    return JSON.parse(data.toString('utf-8'));
  } catch (error) {
    throw new SerializationError(
      `Failed to parse stored JSON: ${toError(error).message}`,
      toError(error)
    );
  }
}

/**
 * Plain UTF-8 JSON, no tag byte
 */
export function createJsonSerializer<V>(): Serializer<V> {
  return {
    dumps: (value: V): Buffer => encodeJson(value),
    loads: (data: Buffer): V => decodeJson<V>(data)
  };
}

/**
 * Default codec: JSON, deflated when that is strictly smaller.
 *
 * Output is `'Z' + zlib(json)` or `'R' + json`; `loads` dispatches on the
 * first byte. The tag layout is part of the persisted format.
 */
export function createZlibJsonSerializer<V>(): Serializer<V> {
  return {
    dumps(value: V): Buffer {
      const raw = encodeJson(value);
      const compressed = deflateSync(raw);

      if (compressed.length < raw.length) {
        return Buffer.concat([Buffer.from([COMPRESSED_TAG]), compressed]);
      }
      return Buffer.concat([Buffer.from([RAW_TAG]), raw]);
    },

    loads(data: Buffer): V {
      if (data.length === 0) {
        throw new SerializationError('Cannot decode an empty payload');
      }

      const tag = data[0];
      const body = data.subarray(1);

      switch (tag) {
        case COMPRESSED_TAG: {
          let inflated: Buffer;
          try {
            inflated = inflateSync(body);
          } catch (error) {
            throw new SerializationError(
              `Failed to inflate stored value: ${toError(error).message}`,
              toError(error)
            );
          }
          return decodeJson<V>(inflated);
        }
        case RAW_TAG:
          return decodeJson<V>(body);
        default:
          throw new SerializationError(
            `Unknown payload tag 0x${tag.toString(16).padStart(2, '0')}`
          );
      }
    }
  };
}

/**
 * Normalize a stored column value to bytes for `loads`.
 * Legacy files may hold TEXT values; those are read as UTF-8.
 */
export function toStoredBytes(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return Buffer.from(value, 'utf-8');
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value);
  }
  throw new SerializationError(
    `Unexpected stored value of type ${typeof value}`
  );
}
