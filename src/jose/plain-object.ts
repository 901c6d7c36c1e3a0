import { parseError } from '../errors/jose.error'
import { parseHeaderBase64Url } from '../header/header-parser'
import { PlainHeader } from '../header/plain-header'
import { Payload } from '../payload/payload'

import { BaseJOSEObject } from './base-jose-object'
import { expectPartCount, splitCompact } from './compact'

import type { Header } from '../header/header-parser'

/**
 * @summary Unsecured JOSE object (`alg: none`). Serialization always succeeds and ends
 * with an empty third segment.
 */
export class PlainObject extends BaseJOSEObject<PlainHeader> {
  readonly kind = 'plain' as const

  constructor(
    private readonly plainHeader: PlainHeader,
    private readonly plainPayload: Payload,
    parsedParts?: readonly string[],
  ) {
    super(parsedParts)
  }

  /**
   * @throws {@link JoseError} with code `PARSE_ERROR` when the string is not a plain object.
   */
  static parse(serialized: string): PlainObject {
    const parts = splitCompact(serialized)
    return PlainObject.fromParts(parts, parseHeaderBase64Url(parts[0]))
  }

  /** @internal */
  static fromParts(parts: readonly string[], header: Header): PlainObject {
    expectPartCount(parts, 3, 'unsecured object')
    if (header.kind !== 'plain') {
      throw parseError('The algorithm "alg" header parameter must be "none"', 'alg')
    }
    if (parts[2] !== '') {
      throw parseError('Unexpected third Base64URL part in unsecured object')
    }
    return new PlainObject(header, Payload.fromBase64Url(parts[1]), parts)
  }

  get header(): PlainHeader {
    return this.plainHeader
  }

  get payload(): Payload {
    return this.plainPayload
  }

  serialize(): string {
    return `${this.plainHeader.toBase64Url()}.${this.plainPayload.toBase64Url()}.`
  }
}
