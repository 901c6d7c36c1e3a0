import { AlgorithmFamily } from '../algorithms/algorithm-family'
import { JoseError, JoseErrorCode, asParseError } from '../errors/jose.error'
import { base64UrlDecode } from '../utils/encoding'
import { getString, requireString } from '../utils/json'

import { BaseJWK, JWKBuilder, assertMaterial, parseCommonParams, requireBase64Url } from './base-jwk'
import { Curve } from './curve'

import type { JsonWebKey, KeyObject } from 'node:crypto'
import type { JsonObject } from '../utils/json'
import type { JWKCommonParams } from './base-jwk'

/**
 * @summary Elliptic curve key (RFC 7518 §6.2): curve, public point and optional `d`.
 */
export class ECKey extends BaseJWK {
  readonly kty = 'EC' as const
  readonly family = AlgorithmFamily.EC
  readonly curve: Curve
  readonly x: string
  readonly y: string
  readonly d?: string

  /** @internal Use {@link ECKeyBuilder} or {@link ECKey.parse}. */
  constructor(curve: Curve, x: string, y: string, d: string | undefined, params: JWKCommonParams) {
    super(params)
    assertMaterial(x, 'x')
    assertMaterial(y, 'y')
    if (d !== undefined) assertMaterial(d, 'd')
    if (curve.bitSize !== undefined) {
      const expected = Math.ceil(curve.bitSize / 8)
      for (const [name, value] of [['x', x], ['y', y]] as const) {
        if (base64UrlDecode(value, name).length !== expected) {
          throw new JoseError(
            JoseErrorCode.INVALID_ARGUMENT,
            `The "${name}" coordinate must be ${expected} bytes for curve ${curve.name}`,
            { field: name },
          )
        }
      }
    }
    this.curve = curve
    this.x = x
    this.y = y
    this.d = d
  }

  /**
   * @summary Parse an `EC` JWK JSON object.
   * @throws {@link JoseError} with code `PARSE_ERROR` naming the missing or malformed member.
   */
  static parse(json: JsonObject): ECKey {
    const crv = requireString(json, 'crv')
    const x = requireBase64Url(requireString(json, 'x'), 'x')
    const y = requireBase64Url(requireString(json, 'y'), 'y')
    const d = getString(json, 'd')
    const builder = new ECKeyBuilder(Curve.parse(crv), x, y)
      .privateKey(d === undefined ? undefined : requireBase64Url(d, 'd'))
      .commonParams(parseCommonParams(json))
    return asParseError(() => builder.build())
  }

  isPrivate(): boolean {
    return this.d !== undefined
  }

  toPublicJWK(): ECKey {
    return new ECKey(this.curve, this.x, this.y, undefined, this.commonParams)
  }

  size(): number {
    return this.curve.bitSize ?? base64UrlDecode(this.x, 'x').length * 8
  }

  requiredParams(): JsonObject {
    return { crv: this.curve.name, kty: this.kty, x: this.x, y: this.y }
  }

  toKeyObject(): KeyObject {
    return this.d === undefined ? this.toPublicKeyObject() : this.importPrivate({ ...this.nodeJwk(), d: this.d })
  }

  toPublicKeyObject(): KeyObject {
    return this.importPublic(this.nodeJwk())
  }

  protected materialJSON(includePrivate: boolean): JsonObject {
    const json: JsonObject = { crv: this.curve.name, x: this.x, y: this.y }
    if (includePrivate && this.d !== undefined) json.d = this.d
    return json
  }

  private nodeJwk(): JsonWebKey {
    return { kty: 'EC', crv: this.curve.name, x: this.x, y: this.y }
  }
}

export class ECKeyBuilder extends JWKBuilder<ECKey> {
  private d?: string

  constructor(
    private readonly curve: Curve,
    private readonly x: string,
    private readonly y: string,
  ) {
    super()
  }

  /** Start from an existing key, e.g. to change its `kid`. */
  static from(key: ECKey): ECKeyBuilder {
    return new ECKeyBuilder(key.curve, key.x, key.y).privateKey(key.d).commonParams(key.commonParams)
  }

  privateKey(d: string | undefined): this {
    this.d = d
    return this
  }

  build(): ECKey {
    return new ECKey(this.curve, this.x, this.y, this.d, this.params)
  }
}
