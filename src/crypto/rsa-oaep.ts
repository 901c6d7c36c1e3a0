import { constants, privateDecrypt, publicEncrypt } from 'node:crypto'

import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { zeroize } from '../utils/bytes'

import { SUPPORTED_ENCRYPTION_METHODS, generateCek, openContent, sealContent } from './content-cipher'
import { assertRsaKeySize, privateKeyObject, publicKeyObject } from './key-material'

import type { KeyObject } from 'node:crypto'
import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JWEHeader } from '../header/jwe-header'
import type { JWECryptoParts, JWEDecrypter, JWEEncrypter } from '../jose/collaborators'
import type { JWEHeaderFilter } from '../jose/header-filter'
import type { RSAKey } from '../jwk/rsa-key'

const OAEP_HASHES: Readonly<Record<string, string>> = { 'RSA-OAEP': 'sha1', 'RSA-OAEP-256': 'sha256' }

const RSA_OAEP_ALGORITHMS: readonly JWEAlgorithm[] = [JWEAlgorithm.RSA_OAEP, JWEAlgorithm.RSA_OAEP_256]

function oaepHash(header: JWEHeader): string {
  const hash = OAEP_HASHES[header.algorithm.name]
  if (hash === undefined) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported RSA key encryption algorithm: ${header.algorithm.name}`)
  }
  return hash
}

/**
 * @summary RSA-OAEP and RSA-OAEP-256 key encryption of a random CEK.
 */
export class RSAEncrypter implements JWEEncrypter {
  readonly supportedAlgorithms = RSA_OAEP_ALGORITHMS
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly publicKey: KeyObject

  /**
   * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the key is not an RSA key
   * of at least 2048 bits.
   */
  constructor(key: RSAKey | KeyObject) {
    this.publicKey = publicKeyObject(key, 'rsa')
    assertRsaKeySize(this.publicKey)
  }

  encrypt(header: JWEHeader, clearText: Uint8Array): JWECryptoParts {
    const hash = oaepHash(header)
    const cek = generateCek(header.encryptionMethod)
    try {
      const encryptedKey = new Uint8Array(
        publicEncrypt({ key: this.publicKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: hash }, cek),
      )
      return { encryptedKey, ...sealContent(header, cek, clearText) }
    } finally {
      zeroize(cek)
    }
  }
}

export class RSADecrypter implements JWEDecrypter {
  readonly supportedAlgorithms = RSA_OAEP_ALGORITHMS
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly privateKey: KeyObject

  constructor(
    key: RSAKey | KeyObject,
    readonly headerFilter?: JWEHeaderFilter,
  ) {
    this.privateKey = privateKeyObject(key, 'rsa')
  }

  /**
   * @throws {@link JoseError} with code `DECRYPT_FAILED` when the key can't be unwrapped or
   * authentication fails.
   */
  decrypt(header: JWEHeader, parts: JWECryptoParts): Uint8Array {
    const hash = oaepHash(header)
    if (parts.encryptedKey === undefined) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Missing JWE encrypted key')
    }
    let cek: Uint8Array
    try {
      cek = new Uint8Array(
        privateDecrypt({ key: this.privateKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: hash }, parts.encryptedKey),
      )
    } catch (error) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, "Couldn't decrypt the content encryption key", undefined, error)
    }
    try {
      return openContent(header, cek, parts)
    } catch (error) {
      if (error instanceof JoseError && error.code === JoseErrorCode.INVALID_KEY_MATERIAL) {
        throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'The decrypted key has the wrong length', undefined, error)
      }
      throw error
    } finally {
      zeroize(cek)
    }
  }
}
