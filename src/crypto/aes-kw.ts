import { createCipheriv, createDecipheriv } from 'node:crypto'

import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { concatBytes, zeroize } from '../utils/bytes'

import { SUPPORTED_ENCRYPTION_METHODS, generateCek, openContent, sealContent } from './content-cipher'
import { secretBytes } from './key-material'

import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JWEHeader } from '../header/jwe-header'
import type { JWECryptoParts, JWEDecrypter, JWEEncrypter } from '../jose/collaborators'
import type { JWEHeaderFilter } from '../jose/header-filter'
import type { OctetSequenceKey } from '../jwk/octet-sequence-key'

/** RFC 3394 default initial value. */
const KW_IV = new Uint8Array([0xa6, 0xa6, 0xa6, 0xa6, 0xa6, 0xa6, 0xa6, 0xa6])

const KW_ALGORITHMS: ReadonlyMap<number, JWEAlgorithm> = new Map([
  [128, JWEAlgorithm.A128KW],
  [192, JWEAlgorithm.A192KW],
  [256, JWEAlgorithm.A256KW],
])

/**
 * @summary AES Key Wrap (RFC 3394) with a 128, 192 or 256-bit key encryption key.
 */
export function wrapKey(kek: Uint8Array, cek: Uint8Array): Uint8Array {
  const cipher = createCipheriv(`id-aes${kek.length * 8}-wrap`, kek, KW_IV)
  return concatBytes(cipher.update(cek), cipher.final())
}

/**
 * @throws {@link JoseError} with code `DECRYPT_FAILED` when the integrity check fails.
 */
export function unwrapKey(kek: Uint8Array, wrapped: Uint8Array): Uint8Array {
  try {
    const decipher = createDecipheriv(`id-aes${kek.length * 8}-wrap`, kek, KW_IV)
    return concatBytes(decipher.update(wrapped), decipher.final())
  } catch (error) {
    throw new JoseError(JoseErrorCode.DECRYPT_FAILED, "Couldn't unwrap the content encryption key", undefined, error)
  }
}

function algorithmFor(kek: Uint8Array): JWEAlgorithm {
  const alg = KW_ALGORITHMS.get(kek.length * 8)
  if (!alg) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `AES key wrap requires a 128, 192 or 256-bit key (got ${kek.length * 8} bits)`,
    )
  }
  return alg
}

/**
 * @summary A128KW, A192KW or A256KW encrypter; the key length selects the algorithm.
 */
export class AESEncrypter implements JWEEncrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly kek: Uint8Array

  constructor(key: OctetSequenceKey | Uint8Array) {
    this.kek = secretBytes(key)
    this.supportedAlgorithms = [algorithmFor(this.kek)]
  }

  encrypt(header: JWEHeader, clearText: Uint8Array): JWECryptoParts {
    const cek = generateCek(header.encryptionMethod)
    try {
      return { encryptedKey: wrapKey(this.kek, cek), ...sealContent(header, cek, clearText) }
    } finally {
      zeroize(cek)
    }
  }
}

export class AESDecrypter implements JWEDecrypter {
  readonly supportedAlgorithms: readonly JWEAlgorithm[]
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly kek: Uint8Array

  constructor(
    key: OctetSequenceKey | Uint8Array,
    readonly headerFilter?: JWEHeaderFilter,
  ) {
    this.kek = secretBytes(key)
    this.supportedAlgorithms = [algorithmFor(this.kek)]
  }

  decrypt(header: JWEHeader, parts: JWECryptoParts): Uint8Array {
    if (parts.encryptedKey === undefined) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Missing JWE encrypted key')
    }
    const cek = unwrapKey(this.kek, parts.encryptedKey)
    try {
      return openContent(header, cek, parts)
    } finally {
      zeroize(cek)
    }
  }
}
