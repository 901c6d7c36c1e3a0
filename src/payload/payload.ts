import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { base64UrlDecode, base64UrlEncode, fromUtf8Bytes, isBase64Url, toUtf8Bytes } from '../utils/encoding'
import { copyJsonObject, isJsonObject } from '../utils/json'

import type { JsonObject } from '../utils/json'

export type PayloadOrigin = 'json' | 'string' | 'bytes' | 'base64url'

/**
 * @summary Content of a JOSE object, viewable as JSON, string, bytes or base64url.
 * @remarks
 * The factory sets the authoritative view and records it as `origin`; the others are
 * derived on first access and cached. A payload parsed from the wire keeps its exact
 * base64url segment.
 */
export class Payload {
  private json?: JsonObject | null
  private text?: string
  private bytes?: Uint8Array
  private base64Url?: string

  private constructor(readonly origin: PayloadOrigin) {}

  /**
   * @summary Payload from bytes, a string or a JSON object, whichever is given.
   */
  static from(input: Uint8Array | string | JsonObject): Payload {
    if (input instanceof Uint8Array) return Payload.fromBytes(input)
    if (typeof input === 'string') return Payload.fromString(input)
    return Payload.fromJson(input)
  }

  static fromJson(json: JsonObject): Payload {
    const payload = new Payload('json')
    payload.text = JSON.stringify(json)
    payload.json = parseObject(payload.text)
    return payload
  }

  static fromString(text: string): Payload {
    const payload = new Payload('string')
    payload.text = text
    return payload
  }

  static fromBytes(bytes: Uint8Array): Payload {
    const payload = new Payload('bytes')
    payload.bytes = new Uint8Array(bytes)
    return payload
  }

  /**
   * @throws {@link JoseError} with code `PARSE_ERROR` when the segment is not base64url.
   */
  static fromBase64Url(segment: string): Payload {
    if (!isBase64Url(segment) || segment.length % 4 === 1) {
      throw new JoseError(JoseErrorCode.PARSE_ERROR, 'Invalid base64url payload', { field: 'payload' })
    }
    const payload = new Payload('base64url')
    payload.base64Url = segment
    return payload
  }

  /**
   * @summary JSON object view, or undefined when the content is not a JSON object. A fresh
   * copy on every call.
   */
  toJson(): JsonObject | undefined {
    if (this.json === undefined) this.json = parseObject(this.toString())
    return this.json === null ? undefined : copyJsonObject(this.json)
  }

  /** UTF-8 string view. */
  toString(): string {
    if (this.text === undefined) this.text = fromUtf8Bytes(this.rawBytes())
    return this.text
  }

  /** Byte view; a fresh copy on every call. */
  toBytes(): Uint8Array {
    return new Uint8Array(this.rawBytes())
  }

  toBase64Url(): string {
    if (this.base64Url === undefined) this.base64Url = base64UrlEncode(this.rawBytes())
    return this.base64Url
  }

  private rawBytes(): Uint8Array {
    if (this.bytes === undefined) {
      this.bytes =
        this.base64Url !== undefined ? base64UrlDecode(this.base64Url, 'payload') : toUtf8Bytes(this.toString())
    }
    return this.bytes
  }
}

function parseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text)
    return isJsonObject(value) ? value : null
  } catch {
    return null
  }
}
