import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { SUPPORTED_ENCRYPTION_METHODS, openContent, sealContent } from './content-cipher'
import { secretBytes } from './key-material'

import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JWEHeader } from '../header/jwe-header'
import type { JWECryptoParts, JWEDecrypter, JWEEncrypter } from '../jose/collaborators'
import type { JWEHeaderFilter } from '../jose/header-filter'
import type { OctetSequenceKey } from '../jwk/octet-sequence-key'

function methodsFor(cek: Uint8Array): readonly EncryptionMethod[] {
  const methods = SUPPORTED_ENCRYPTION_METHODS.filter(enc => enc.cekBitLength === cek.length * 8)
  if (methods.length === 0) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `The key length of ${cek.length * 8} bits matches no encryption method`,
    )
  }
  return methods
}

/**
 * @summary `dir` encrypter: the shared key is the content encryption key, so its length
 * selects the usable `enc` values (128, 192 or 256 bits for GCM; 256, 384 or 512 for CBC-HS).
 */
export class DirectEncrypter implements JWEEncrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[] = [JWEAlgorithm.DIR]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[]
  private readonly cek: Uint8Array

  /**
   * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when no method fits the key length.
   */
  constructor(key: OctetSequenceKey | Uint8Array) {
    this.cek = secretBytes(key)
    this.supportedEncryptionMethods = methodsFor(this.cek)
  }

  encrypt(header: JWEHeader, clearText: Uint8Array): JWECryptoParts {
    return sealContent(header, this.cek, clearText)
  }
}

export class DirectDecrypter implements JWEDecrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[] = [JWEAlgorithm.DIR]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[]
  private readonly cek: Uint8Array

  constructor(
    key: OctetSequenceKey | Uint8Array,
    readonly headerFilter?: JWEHeaderFilter,
  ) {
    this.cek = secretBytes(key)
    this.supportedEncryptionMethods = methodsFor(this.cek)
  }

  /**
   * @throws {@link JoseError} with code `DECRYPT_FAILED` when an encrypted key is present or
   * authentication fails.
   */
  decrypt(header: JWEHeader, parts: JWECryptoParts): Uint8Array {
    if (parts.encryptedKey !== undefined) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Unexpected encrypted key for direct encryption')
    }
    return openContent(header, this.cek, parts)
  }
}
