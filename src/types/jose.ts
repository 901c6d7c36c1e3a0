import type { JWSAlgorithm } from '../algorithms/jws-algorithm'
import type { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JOSEObjectType } from '../algorithms/jose-object-type'
import type { JWEHeader } from '../header/jwe-header'
import type { JWSObject } from '../jose/jws-object'
import type { JWK } from '../jwk/jwk'
import type { JsonObject, JsonValue } from '../utils/json'

/** Content accepted by the signing and encryption services. */
export type PayloadInput = Uint8Array | string | JsonObject

export interface JwsSignOptions {
  /** Defaults to the key's `alg`, else HS256, RS256 or the curve's ES algorithm. */
  alg?: JWSAlgorithm
  /** Signing key id; defaults to the active key id, then the first usable key. */
  kid?: string
  typ?: JOSEObjectType
  contentType?: string
  /** Extra protected header parameters. */
  customParams?: Readonly<Record<string, JsonValue>>
  /** Omit the payload segment (RFC 7515 Appendix F). */
  detached?: boolean
  /** Sign the payload unencoded (RFC 7797); adds `b64` to `crit`. */
  unencodedPayload?: boolean
}

export interface JwsVerifyOptions {
  /** Overrides the module's accepted JWS algorithms for this call. */
  acceptedAlgorithms?: readonly JWSAlgorithm[]
  /** Content of a detached JWS. */
  detachedPayload?: Uint8Array | string
}

export interface JwsVerifyResult {
  valid: boolean
  object: JWSObject
  /** The key that validated the signature, when one did. */
  key?: JWK
}

export interface JweEncryptOptions {
  /** Defaults to the key's `alg`, else `dir`, RSA-OAEP-256 or ECDH-ES by key type. */
  alg?: JWEAlgorithm
  /** Defaults to the module's `defaultEncryptionMethod`. */
  enc?: EncryptionMethod
  kid?: string
  /** Deflate the plaintext before encryption. */
  compress?: boolean
  contentType?: string
  customParams?: Readonly<Record<string, JsonValue>>
}

export interface JweDecryptOptions {
  acceptedAlgorithms?: readonly JWEAlgorithm[]
  acceptedEncryptionMethods?: readonly EncryptionMethod[]
}

export interface JweDecryptResult {
  plaintext: Uint8Array
  header: JWEHeader
  key: JWK
}

