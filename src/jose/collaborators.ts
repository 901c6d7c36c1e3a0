import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import type { JWSAlgorithm } from '../algorithms/jws-algorithm'
import type { JWEHeader } from '../header/jwe-header'
import type { JWSHeader } from '../header/jws-header'
import type { JWEHeaderFilter, JWSHeaderFilter } from './header-filter'

/**
 * Computes JWS signatures.
 */
export interface JWSSigner {
  readonly supportedAlgorithms: readonly JWSAlgorithm[]
  /**
   * @param signingInput The exact bytes to sign: `BASE64URL(header) "." BASE64URL(payload)`.
   */
  sign(header: JWSHeader, signingInput: Uint8Array): Uint8Array
}

/**
 * Checks JWS signatures. A wrong signature is a `false` result, never an error.
 */
export interface JWSVerifier {
  readonly supportedAlgorithms: readonly JWSAlgorithm[]
  /** Restricts the algorithms and header parameters the verifier will look at. */
  readonly headerFilter?: JWSHeaderFilter
  verify(header: JWSHeader, signingInput: Uint8Array, signature: Uint8Array): boolean
}

/**
 * Binary parts of a JWE, as produced by an encrypter. An encrypter that adds parameters
 * to the header (for instance an ephemeral key) returns the header it authenticated.
 */
export interface JWECryptoParts {
  header?: JWEHeader
  encryptedKey?: Uint8Array
  iv?: Uint8Array
  cipherText: Uint8Array
  authTag?: Uint8Array
}

export interface JWEEncrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[]
  encrypt(header: JWEHeader, clearText: Uint8Array): JWECryptoParts
}

export interface JWEDecrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[]
  readonly headerFilter?: JWEHeaderFilter
  /**
   * @throws {@link JoseError} with code `DECRYPT_FAILED` when authentication fails.
   */
  decrypt(header: JWEHeader, parts: JWECryptoParts): Uint8Array
}
