import { timingSafeEqual } from 'node:crypto'

import type { Buffer } from 'node:buffer'

export type BinaryLike = string | Uint8Array | Buffer

/**
 * @summary Convert a string/Buffer/Uint8Array to Uint8Array (strings as UTF-8).
 */
export function toBytes(input: BinaryLike): Uint8Array {
  if (typeof input === 'string') {
    return new TextEncoder().encode(input)
  }
  if (input instanceof Uint8Array) {
    return input
  }
  return new Uint8Array(input)
}

/**
 * @summary Concatenate multiple byte arrays.
 */
export function concatBytes(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}

/**
 * @summary Compare two byte arrays in constant time (for equal lengths).
 * @returns False immediately when the lengths differ.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  return timingSafeEqual(a, b)
}

/**
 * @summary Encode a non-negative integer as 8 big-endian bytes.
 * @remarks Used for the AAD length block of AES-CBC-HMAC-SHA2 content encryption.
 */
export function uint64BigEndian(value: number): Uint8Array {
  const out = new Uint8Array(8)
  new DataView(out.buffer).setBigUint64(0, BigInt(value))
  return out
}

/**
 * @summary Overwrite the provided byte array with zeros.
 * @remarks
 * Used to clear content encryption keys once a JWE has been produced. JavaScript
 * gives no guarantee that no other copy survives in memory.
 */
export function zeroize(bytes: Uint8Array): void {
  bytes.fill(0)
}
