import { createSecretKey } from 'node:crypto'

import { AlgorithmFamily } from '../algorithms/algorithm-family'
import { JoseError, JoseErrorCode, asParseError } from '../errors/jose.error'
import { base64UrlDecode, base64UrlEncode } from '../utils/encoding'
import { requireString } from '../utils/json'

import { BaseJWK, JWKBuilder, assertMaterial, parseCommonParams, requireBase64Url } from './base-jwk'

import type { KeyObject } from 'node:crypto'
import type { JsonObject } from '../utils/json'
import type { JWKCommonParams } from './base-jwk'

/**
 * @summary Symmetric key (`oct`). Always private, with no public projection.
 */
export class OctetSequenceKey extends BaseJWK {
  readonly kty = 'oct' as const
  readonly family = AlgorithmFamily.OCT
  readonly k: string

  /** @internal Use {@link OctetSequenceKeyBuilder} or {@link OctetSequenceKey.parse}. */
  constructor(k: string, params: JWKCommonParams) {
    super(params)
    assertMaterial(k, 'k')
    this.k = k
  }

  static parse(json: JsonObject): OctetSequenceKey {
    const k = requireBase64Url(requireString(json, 'k'), 'k')
    return asParseError(() => new OctetSequenceKeyBuilder(k).commonParams(parseCommonParams(json)).build())
  }

  /** Decoded key value. */
  toBytes(): Uint8Array {
    return base64UrlDecode(this.k, 'k')
  }

  isPrivate(): boolean {
    return true
  }

  toPublicJWK(): undefined {
    return undefined
  }

  size(): number {
    return this.toBytes().length * 8
  }

  requiredParams(): JsonObject {
    return { k: this.k, kty: this.kty }
  }

  toKeyObject(): KeyObject {
    return createSecretKey(this.toBytes())
  }

  toPublicKeyObject(): KeyObject {
    throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, 'Octet sequence keys have no public form')
  }

  protected materialJSON(includePrivate: boolean): JsonObject {
    return includePrivate ? { k: this.k } : {}
  }
}

export class OctetSequenceKeyBuilder extends JWKBuilder<OctetSequenceKey> {
  constructor(private readonly k: string) {
    super()
  }

  static fromBytes(bytes: Uint8Array): OctetSequenceKeyBuilder {
    return new OctetSequenceKeyBuilder(base64UrlEncode(bytes))
  }

  static from(key: OctetSequenceKey): OctetSequenceKeyBuilder {
    return new OctetSequenceKeyBuilder(key.k).commonParams(key.commonParams)
  }

  build(): OctetSequenceKey {
    return new OctetSequenceKey(this.k, this.params)
  }
}
