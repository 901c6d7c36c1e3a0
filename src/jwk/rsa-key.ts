import { AlgorithmFamily } from '../algorithms/algorithm-family'
import { JoseError, JoseErrorCode, asParseError, parseError } from '../errors/jose.error'
import { base64UrlDecode } from '../utils/encoding'
import { getArray, getString, isJsonObject, requireString } from '../utils/json'

import { BaseJWK, JWKBuilder, assertMaterial, parseCommonParams, requireBase64Url } from './base-jwk'

import type { JsonWebKey, KeyObject } from 'node:crypto'
import type { JsonObject } from '../utils/json'
import type { JWKCommonParams } from './base-jwk'

/**
 * Additional prime of a multi-prime RSA key (`oth`, RFC 7518 §6.3.2.7).
 */
export interface RSAOtherPrime {
  readonly r: string
  readonly d: string
  readonly t: string
}

/**
 * CRT members of an RSA private key. Either all are present or none.
 */
export interface RSAPrivateCrtParams {
  p: string
  q: string
  dp: string
  dq: string
  qi: string
}

const CRT_MEMBERS = ['p', 'q', 'dp', 'dq', 'qi'] as const

interface RSAPrivateParams {
  d?: string
  crt?: RSAPrivateCrtParams
  oth?: readonly RSAOtherPrime[]
}

/**
 * @summary RSA key (RFC 7518 §6.3).
 * @remarks
 * A private key carries `d`, the CRT members, or both. `oth` is only allowed together
 * with the CRT members.
 */
export class RSAKey extends BaseJWK {
  readonly kty = 'RSA' as const
  readonly family = AlgorithmFamily.RSA
  readonly n: string
  readonly e: string
  readonly d?: string
  readonly p?: string
  readonly q?: string
  readonly dp?: string
  readonly dq?: string
  readonly qi?: string
  readonly oth?: readonly RSAOtherPrime[]

  /** @internal Use {@link RSAKeyBuilder} or {@link RSAKey.parse}. */
  constructor(n: string, e: string, priv: RSAPrivateParams, params: JWKCommonParams) {
    super(params)
    assertMaterial(n, 'n')
    assertMaterial(e, 'e')
    if (priv.d !== undefined) assertMaterial(priv.d, 'd')
    if (priv.crt) {
      for (const name of CRT_MEMBERS) assertMaterial(priv.crt[name], name)
    }
    if (priv.oth) {
      if (!priv.crt) {
        throw new JoseError(
          JoseErrorCode.INVALID_ARGUMENT,
          'The "oth" parameter requires the first and second prime factors',
          { field: 'oth' },
        )
      }
      for (const prime of priv.oth) {
        assertMaterial(prime.r, 'oth.r')
        assertMaterial(prime.d, 'oth.d')
        assertMaterial(prime.t, 'oth.t')
      }
    }
    this.n = n
    this.e = e
    this.d = priv.d
    this.p = priv.crt?.p
    this.q = priv.crt?.q
    this.dp = priv.crt?.dp
    this.dq = priv.crt?.dq
    this.qi = priv.crt?.qi
    this.oth = priv.oth && Object.freeze(priv.oth.map(prime => Object.freeze({ ...prime })))
  }

  /**
   * @summary Parse an `RSA` JWK JSON object.
   * @throws {@link JoseError} with code `PARSE_ERROR` naming the missing or malformed member.
   */
  static parse(json: JsonObject): RSAKey {
    const n = requireBase64Url(requireString(json, 'n'), 'n')
    const e = requireBase64Url(requireString(json, 'e'), 'e')
    const optional = (name: string): string | undefined => {
      const value = getString(json, name)
      return value === undefined ? undefined : requireBase64Url(value, name)
    }
    const builder = new RSAKeyBuilder(n, e).privateExponent(optional('d'))
    const [p, q, dp, dq, qi] = CRT_MEMBERS.map(optional)
    if (p !== undefined || q !== undefined || dp !== undefined || dq !== undefined || qi !== undefined) {
      if (p === undefined || q === undefined || dp === undefined || dq === undefined || qi === undefined) {
        throw parseError('Incomplete RSA private CRT parameters: p, q, dp, dq and qi are all required')
      }
      builder.crtParams({ p, q, dp, dq, qi })
    }
    const oth = getArray(json, 'oth')
    if (oth !== undefined) builder.otherPrimes(oth.map(parseOtherPrime))
    return asParseError(() => builder.commonParams(parseCommonParams(json)).build())
  }

  isPrivate(): boolean {
    return this.d !== undefined || this.p !== undefined
  }

  toPublicJWK(): RSAKey {
    return new RSAKey(this.n, this.e, {}, this.commonParams)
  }

  /** Bit length of the modulus. */
  size(): number {
    const modulus = base64UrlDecode(this.n, 'n')
    let offset = 0
    while (offset < modulus.length && modulus[offset] === 0) offset++
    if (offset === modulus.length) return 0
    return (modulus.length - offset - 1) * 8 + modulus[offset].toString(2).length
  }

  requiredParams(): JsonObject {
    return { e: this.e, kty: this.kty, n: this.n }
  }

  get crtParams(): RSAPrivateCrtParams | undefined {
    const { p, q, dp, dq, qi } = this
    if (p === undefined || q === undefined || dp === undefined || dq === undefined || qi === undefined) {
      return undefined
    }
    return { p, q, dp, dq, qi }
  }

  /**
   * @remarks Node imports private RSA keys only with the CRT members present.
   */
  toKeyObject(): KeyObject {
    if (!this.isPrivate()) return this.toPublicKeyObject()
    return this.importPrivate({ ...this.nodeJwk(), d: this.d, ...this.crtParams })
  }

  toPublicKeyObject(): KeyObject {
    return this.importPublic(this.nodeJwk())
  }

  protected materialJSON(includePrivate: boolean): JsonObject {
    const json: JsonObject = { n: this.n, e: this.e }
    if (!includePrivate) return json
    if (this.d !== undefined) json.d = this.d
    const crt = this.crtParams
    if (crt) Object.assign(json, crt)
    if (this.oth) json.oth = this.oth.map(prime => ({ r: prime.r, d: prime.d, t: prime.t }))
    return json
  }

  private nodeJwk(): JsonWebKey {
    return { kty: 'RSA', n: this.n, e: this.e }
  }
}

function parseOtherPrime(value: unknown, index: number): RSAOtherPrime {
  if (!isJsonObject(value)) {
    throw parseError(`Invalid "oth" entry at position ${index}: not a JSON object`, 'oth')
  }
  return {
    r: requireBase64Url(requireString(value, 'r'), 'oth.r'),
    d: requireBase64Url(requireString(value, 'd'), 'oth.d'),
    t: requireBase64Url(requireString(value, 't'), 'oth.t'),
  }
}

export class RSAKeyBuilder extends JWKBuilder<RSAKey> {
  private priv: RSAPrivateParams = {}

  constructor(
    private readonly n: string,
    private readonly e: string,
  ) {
    super()
  }

  static from(key: RSAKey): RSAKeyBuilder {
    return new RSAKeyBuilder(key.n, key.e)
      .privateExponent(key.d)
      .crtParams(key.crtParams)
      .otherPrimes(key.oth)
      .commonParams(key.commonParams)
  }

  privateExponent(d: string | undefined): this {
    this.priv.d = d
    return this
  }

  crtParams(crt: RSAPrivateCrtParams | undefined): this {
    this.priv.crt = crt && { ...crt }
    return this
  }

  otherPrimes(oth: readonly RSAOtherPrime[] | undefined): this {
    this.priv.oth = oth
    return this
  }

  build(): RSAKey {
    return new RSAKey(this.n, this.e, { ...this.priv }, this.params)
  }
}
