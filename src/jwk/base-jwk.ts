import { createHash, createPrivateKey, createPublicKey } from 'node:crypto'

import { Algorithm } from '../algorithms/algorithm'
import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { canonicalJson } from '../utils/canonical'
import { base64Decode, base64UrlEncode, isBase64Url } from '../utils/encoding'
import { getString, getStringArray, getUrl } from '../utils/json'

import { isUseConsistentWithOperations, parseKeyOperations } from './key-operation'
import { KeyUse } from './key-use'

import type { JsonWebKey, KeyObject } from 'node:crypto'
import type { AlgorithmFamily } from '../algorithms/algorithm-family'
import type { JsonObject } from '../utils/json'
import type { KeyOperation } from './key-operation'

export type KeyType = 'EC' | 'RSA' | 'oct'

/**
 * Members shared by every key family (RFC 7517 §4).
 */
export interface JWKCommonParams {
  use?: KeyUse
  keyOperations?: readonly KeyOperation[]
  algorithm?: Algorithm
  keyId?: string
  x509CertUrl?: string
  x509CertThumbprint?: string
  x509CertSha256Thumbprint?: string
  x509CertChain?: readonly string[]
}

/**
 * @summary Immutable base of the EC, RSA and octet sequence keys.
 */
export abstract class BaseJWK {
  abstract readonly kty: KeyType
  abstract readonly family: AlgorithmFamily

  readonly use?: KeyUse
  readonly keyOperations?: readonly KeyOperation[]
  readonly algorithm?: Algorithm
  readonly keyId?: string
  readonly x509CertUrl?: string
  readonly x509CertThumbprint?: string
  readonly x509CertSha256Thumbprint?: string
  readonly x509CertChain?: readonly string[]

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `use` and `key_ops`
   * contradict each other or a thumbprint is not base64url.
   */
  protected constructor(params: JWKCommonParams) {
    if (!isUseConsistentWithOperations(params.use, params.keyOperations)) {
      throw new JoseError(
        JoseErrorCode.INVALID_ARGUMENT,
        'The key use "use" and key operations "key_ops" parameters are not consistent',
      )
    }
    for (const [name, value] of [
      ['x5t', params.x509CertThumbprint],
      ['x5t#S256', params.x509CertSha256Thumbprint],
    ] as const) {
      if (value !== undefined && !isBase64Url(value)) {
        throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The ${name} parameter must be base64url`)
      }
    }
    this.use = params.use
    this.keyOperations = params.keyOperations && Object.freeze([...params.keyOperations])
    this.algorithm = params.algorithm
    this.keyId = params.keyId
    this.x509CertUrl = params.x509CertUrl
    this.x509CertThumbprint = params.x509CertThumbprint
    this.x509CertSha256Thumbprint = params.x509CertSha256Thumbprint
    this.x509CertChain = params.x509CertChain && Object.freeze([...params.x509CertChain])
  }

  /** True when the key carries private (or secret) material. */
  abstract isPrivate(): boolean

  /** Public projection, or undefined for keys without one. */
  abstract toPublicJWK(): BaseJWK | undefined

  /** Key size in bits. */
  abstract size(): number

  /**
   * @summary The members hashed for the RFC 7638 thumbprint, `kty` included.
   */
  abstract requiredParams(): JsonObject

  /** Node key object: private or secret when available, public otherwise. */
  abstract toKeyObject(): KeyObject

  /**
   * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` for keys without a public form.
   */
  abstract toPublicKeyObject(): KeyObject

  protected abstract materialJSON(includePrivate: boolean): JsonObject

  /** Common members of this key, for deriving modified copies. */
  get commonParams(): JWKCommonParams {
    return {
      use: this.use,
      keyOperations: this.keyOperations,
      algorithm: this.algorithm,
      keyId: this.keyId,
      x509CertUrl: this.x509CertUrl,
      x509CertThumbprint: this.x509CertThumbprint,
      x509CertSha256Thumbprint: this.x509CertSha256Thumbprint,
      x509CertChain: this.x509CertChain,
    }
  }

  /**
   * @summary RFC 7638 thumbprint: base64url of the hash of the canonical required members.
   * @param hash Node digest name.
   */
  computeThumbprint(hash = 'sha256'): string {
    const digest = createHash(hash).update(canonicalJson(this.requiredParams()), 'utf8').digest()
    return base64UrlEncode(digest)
  }

  /**
   * @summary Full JSON form, private members included.
   */
  toJSON(): JsonObject {
    return { ...this.commonJSON(), ...this.materialJSON(true) }
  }

  /**
   * @summary JSON form of the public projection, undefined for keys without one.
   */
  toPublicJSON(): JsonObject | undefined {
    return this.toPublicJWK()?.toJSON()
  }

  /**
   * @summary Value equality over the full JSON form.
   */
  equals(other: unknown): boolean {
    return other instanceof BaseJWK && canonicalJson(other.toJSON()) === canonicalJson(this.toJSON())
  }

  protected commonJSON(): JsonObject {
    const json: JsonObject = { kty: this.kty }
    if (this.use) json.use = this.use.identifier
    if (this.keyOperations) json.key_ops = [...this.keyOperations]
    if (this.algorithm) json.alg = this.algorithm.name
    if (this.keyId !== undefined) json.kid = this.keyId
    if (this.x509CertUrl !== undefined) json.x5u = this.x509CertUrl
    if (this.x509CertThumbprint !== undefined) json.x5t = this.x509CertThumbprint
    if (this.x509CertSha256Thumbprint !== undefined) json['x5t#S256'] = this.x509CertSha256Thumbprint
    if (this.x509CertChain) json.x5c = [...this.x509CertChain]
    return json
  }

  protected importPrivate(jwk: JsonWebKey): KeyObject {
    return importKey(() => createPrivateKey({ key: jwk, format: 'jwk' }))
  }

  protected importPublic(jwk: JsonWebKey): KeyObject {
    return importKey(() => createPublicKey({ key: jwk, format: 'jwk' }))
  }
}

function importKey(load: () => KeyObject): KeyObject {
  try {
    return load()
  } catch (error) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `Couldn't import key: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      error,
    )
  }
}

/**
 * @summary Fluent collector of the common members; subclasses add the key material.
 */
export abstract class JWKBuilder<T extends BaseJWK> {
  protected params: JWKCommonParams = {}

  keyUse(use: KeyUse | undefined): this {
    this.params.use = use
    return this
  }

  keyOperations(ops: Iterable<KeyOperation> | undefined): this {
    this.params.keyOperations = ops === undefined ? undefined : [...ops]
    return this
  }

  algorithm(alg: Algorithm | undefined): this {
    this.params.algorithm = alg
    return this
  }

  keyId(kid: string | undefined): this {
    this.params.keyId = kid
    return this
  }

  /**
   * @summary Set the key id to the RFC 7638 thumbprint of the key being built.
   */
  keyIdFromThumbprint(hash = 'sha256'): this {
    this.params.keyId = this.build().computeThumbprint(hash)
    return this
  }

  x509CertUrl(url: string | undefined): this {
    this.params.x509CertUrl = url
    return this
  }

  x509CertThumbprint(thumbprint: string | undefined): this {
    this.params.x509CertThumbprint = thumbprint
    return this
  }

  x509CertSha256Thumbprint(thumbprint: string | undefined): this {
    this.params.x509CertSha256Thumbprint = thumbprint
    return this
  }

  x509CertChain(chain: readonly string[] | undefined): this {
    this.params.x509CertChain = chain
    return this
  }

  /** Overwrite every common member with the given set. */
  commonParams(params: JWKCommonParams): this {
    this.params = { ...params }
    return this
  }

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when the key is incomplete or
   * inconsistent.
   */
  abstract build(): T
}

/**
 * @summary Read the common members of a JWK JSON object.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the offending member.
 */
export function parseCommonParams(json: JsonObject): JWKCommonParams {
  const use = getString(json, 'use')
  const ops = getStringArray(json, 'key_ops')
  const alg = getString(json, 'alg')
  const x5t = getString(json, 'x5t')
  const x5tS256 = getString(json, 'x5t#S256')
  const x5c = getStringArray(json, 'x5c')
  if (x5t !== undefined) requireBase64Url(x5t, 'x5t')
  if (x5tS256 !== undefined) requireBase64Url(x5tS256, 'x5t#S256')
  x5c?.forEach(entry => base64Decode(entry, 'x5c'))
  return {
    use: use === undefined ? undefined : KeyUse.parse(use),
    keyOperations: ops === undefined ? undefined : parseKeyOperations(ops),
    algorithm: alg === undefined ? undefined : new Algorithm(alg),
    keyId: getString(json, 'kid'),
    x509CertUrl: getUrl(json, 'x5u'),
    x509CertThumbprint: x5t,
    x509CertSha256Thumbprint: x5tS256,
    x509CertChain: x5c,
  }
}

/**
 * @summary Read a mandatory or optional base64url key material member.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the member.
 */
export function requireBase64Url(value: string, name: string): string {
  if (!isBase64Url(value)) {
    throw parseError(`Invalid base64url in JSON object member "${name}"`, name)
  }
  return value
}

/**
 * @summary Assert a builder-supplied key material value is non-empty base64url.
 * @throws {@link JoseError} with code `INVALID_ARGUMENT` naming the member.
 */
export function assertMaterial(value: string | undefined, name: string): asserts value is string {
  if (!value) {
    throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The "${name}" parameter must not be empty`, { field: name })
  }
  if (!isBase64Url(value)) {
    throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The "${name}" parameter must be base64url`, { field: name })
  }
}
