import { Buffer } from 'node:buffer'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

const BASE64URL_PATTERN = /^[\w-]*$/
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * @summary Convert a UTF-8 string to bytes.
 * @example
 * ```ts
 * const bytes = toUtf8Bytes('hello')
 * ```
 */
export function toUtf8Bytes(input: string): Uint8Array {
  return new TextEncoder().encode(input)
}

/**
 * @summary Convert bytes to a UTF-8 string (non-strict, replaces invalid sequences).
 */
export function fromUtf8Bytes(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes)
}

/**
 * @summary Test whether a string uses only the base64url alphabet (no padding).
 */
export function isBase64Url(value: string): boolean {
  return BASE64URL_PATTERN.test(value)
}

/**
 * @summary Encode bytes to base64url string (URL-safe, no padding).
 * @example
 * ```ts
 * const encoded = base64UrlEncode(bytes)
 * ```
 */
export function base64UrlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url')
}

/**
 * @summary Encode a UTF-8 string to base64url.
 */
export function base64UrlEncodeString(input: string): string {
  return base64UrlEncode(toUtf8Bytes(input))
}

/**
 * @summary Decode base64url string to bytes.
 * @param input Base64url-encoded string (URL-safe, no padding).
 * @param name Optional name of the decoded value for error messages.
 * @throws {@link JoseError} with code `PARSE_ERROR` when input is malformed.
 * @example
 * ```ts
 * const bytes = base64UrlDecode('AQID')
 * ```
 */
export function base64UrlDecode(input: string, name?: string): Uint8Array {
  // A single trailing character carries fewer than 8 bits and cannot be decoded
  if (!isBase64Url(input) || input.length % 4 === 1) {
    throw new JoseError(
      JoseErrorCode.PARSE_ERROR,
      `Invalid base64url string${name ? ` for ${name}` : ''}`,
      name === undefined ? undefined : { field: name },
    )
  }
  return new Uint8Array(Buffer.from(input, 'base64url'))
}

/**
 * @summary Decode a base64url string to a UTF-8 string.
 * @throws {@link JoseError} with code `PARSE_ERROR` when input is malformed.
 */
export function base64UrlDecodeToString(input: string, name?: string): string {
  return fromUtf8Bytes(base64UrlDecode(input, name))
}

/**
 * @summary Encode bytes to standard base64 (with padding), as used by `x5c` entries.
 */
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64')
}

/**
 * @summary Decode a standard base64 string.
 * @throws {@link JoseError} with code `PARSE_ERROR` when input is malformed.
 */
export function base64Decode(input: string, name?: string): Uint8Array {
  if (!BASE64_PATTERN.test(input) || input.length % 4 !== 0) {
    throw new JoseError(
      JoseErrorCode.PARSE_ERROR,
      `Invalid base64 string${name ? ` for ${name}` : ''}`,
      name === undefined ? undefined : { field: name },
    )
  }
  return new Uint8Array(Buffer.from(input, 'base64'))
}
