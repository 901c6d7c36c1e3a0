import { createCipheriv, createDecipheriv, createHmac, randomBytes } from 'node:crypto'
import { deflateRawSync, inflateRawSync } from 'node:zlib'

import { CompressionAlgorithm } from '../algorithms/compression-algorithm'
import { EncryptionMethod } from '../algorithms/encryption-method'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { bytesEqual, concatBytes, uint64BigEndian } from '../utils/bytes'
import { toUtf8Bytes } from '../utils/encoding'
import { assertKeyLength } from '../utils/validation'

import type { CipherGCMTypes } from 'node:crypto'
import type { JWEHeader } from '../header/jwe-header'

/** Every content encryption method this module implements. */
export const SUPPORTED_ENCRYPTION_METHODS: readonly EncryptionMethod[] = Object.freeze([
  EncryptionMethod.A128CBC_HS256,
  EncryptionMethod.A192CBC_HS384,
  EncryptionMethod.A256CBC_HS512,
  EncryptionMethod.A128GCM,
  EncryptionMethod.A192GCM,
  EncryptionMethod.A256GCM,
])

export interface AuthenticatedCipherText {
  iv: Uint8Array
  cipherText: Uint8Array
  authTag: Uint8Array
}

const GCM_IV_BYTES = 12
const GCM_TAG_BYTES = 16
const CBC_IV_BYTES = 16

const GCM_CIPHERS: Readonly<Record<number, CipherGCMTypes>> = {
  128: 'aes-128-gcm',
  192: 'aes-192-gcm',
  256: 'aes-256-gcm',
}

const CBC_HMAC_HASHES: Readonly<Record<number, string>> = { 256: 'sha256', 384: 'sha384', 512: 'sha512' }

function requireKnownMethod(enc: EncryptionMethod): number {
  if (!SUPPORTED_ENCRYPTION_METHODS.some(method => method.equals(enc))) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported encryption method: ${enc.name}`)
  }
  return EncryptionMethod.parse(enc.name).cekBitLength
}

/**
 * @summary Random content encryption key of the length `enc` requires.
 * @throws {@link JoseError} with code `UNSUPPORTED_ALG` for an unknown method.
 */
export function generateCek(enc: EncryptionMethod): Uint8Array {
  return new Uint8Array(randomBytes(requireKnownMethod(enc) / 8))
}

/**
 * @summary The additional authenticated data of a JWE: the ASCII of the encoded header.
 */
export function aadOf(header: JWEHeader): Uint8Array {
  return toUtf8Bytes(header.toBase64Url())
}

/**
 * @summary Encrypt with AES-GCM or AES-CBC-HMAC-SHA2 (RFC 7518 §5.2, §5.3).
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the key length doesn't
 * match `enc`, or `UNSUPPORTED_ALG` for an unknown method.
 */
export function encryptContent(
  enc: EncryptionMethod,
  cek: Uint8Array,
  clearText: Uint8Array,
  aad: Uint8Array,
): AuthenticatedCipherText {
  const bits = requireKnownMethod(enc)
  assertKeyLength(`The content encryption key for ${enc.name}`, cek, bits)
  if (EncryptionMethod.Family.AES_GCM.has(enc)) {
    const iv = new Uint8Array(randomBytes(GCM_IV_BYTES))
    const cipher = createCipheriv(GCM_CIPHERS[bits], cek, iv, { authTagLength: GCM_TAG_BYTES })
    cipher.setAAD(aad)
    const cipherText = concatBytes(cipher.update(clearText), cipher.final())
    return { iv, cipherText, authTag: new Uint8Array(cipher.getAuthTag()) }
  }
  const { macKey, encKey, hash } = splitCbcKey(cek, bits)
  const iv = new Uint8Array(randomBytes(CBC_IV_BYTES))
  const cipher = createCipheriv(`aes-${bits / 2}-cbc`, encKey, iv)
  const cipherText = concatBytes(cipher.update(clearText), cipher.final())
  return { iv, cipherText, authTag: cbcTag(hash, macKey, aad, iv, cipherText) }
}

/**
 * @summary Inverse of {@link encryptContent}.
 * @throws {@link JoseError} with code `DECRYPT_FAILED` when authentication fails.
 */
export function decryptContent(
  enc: EncryptionMethod,
  cek: Uint8Array,
  parts: AuthenticatedCipherText,
  aad: Uint8Array,
): Uint8Array {
  const bits = requireKnownMethod(enc)
  assertKeyLength(`The content encryption key for ${enc.name}`, cek, bits)
  if (EncryptionMethod.Family.AES_GCM.has(enc)) {
    if (parts.authTag.length !== GCM_TAG_BYTES) throw authFailure()
    try {
      const decipher = createDecipheriv(GCM_CIPHERS[bits], cek, parts.iv, { authTagLength: GCM_TAG_BYTES })
      decipher.setAAD(aad)
      decipher.setAuthTag(parts.authTag)
      return concatBytes(decipher.update(parts.cipherText), decipher.final())
    } catch (error) {
      throw authFailure(error)
    }
  }
  const { macKey, encKey, hash } = splitCbcKey(cek, bits)
  if (!bytesEqual(cbcTag(hash, macKey, aad, parts.iv, parts.cipherText), parts.authTag)) {
    throw authFailure()
  }
  try {
    const decipher = createDecipheriv(`aes-${bits / 2}-cbc`, encKey, parts.iv)
    return concatBytes(decipher.update(parts.cipherText), decipher.final())
  } catch (error) {
    throw authFailure(error)
  }
}

function authFailure(cause?: unknown): JoseError {
  return new JoseError(JoseErrorCode.DECRYPT_FAILED, 'JWE authentication failed', undefined, cause)
}

function splitCbcKey(cek: Uint8Array, bits: number): { macKey: Uint8Array, encKey: Uint8Array, hash: string } {
  const half = bits / 16
  return { macKey: cek.slice(0, half), encKey: cek.slice(half), hash: CBC_HMAC_HASHES[bits] }
}

function cbcTag(hash: string, macKey: Uint8Array, aad: Uint8Array, iv: Uint8Array, cipherText: Uint8Array): Uint8Array {
  const mac = createHmac(hash, macKey)
    .update(concatBytes(aad, iv, cipherText, uint64BigEndian(aad.length * 8)))
    .digest()
  return new Uint8Array(mac.subarray(0, macKey.length))
}

/**
 * @summary Apply the header's `zip` before encryption.
 * @throws {@link JoseError} with code `UNSUPPORTED_ALG` for an unknown compression algorithm.
 */
export function compress(header: JWEHeader, clearText: Uint8Array): Uint8Array {
  if (!header.compression) return clearText
  requireDeflate(header.compression)
  return new Uint8Array(deflateRawSync(clearText))
}

/**
 * @summary Undo the header's `zip` after decryption.
 * @throws {@link JoseError} with code `DECRYPT_FAILED` when the data doesn't inflate.
 */
export function decompress(header: JWEHeader, data: Uint8Array): Uint8Array {
  if (!header.compression) return data
  requireDeflate(header.compression)
  try {
    return new Uint8Array(inflateRawSync(data))
  } catch (error) {
    throw new JoseError(JoseErrorCode.DECRYPT_FAILED, "Couldn't decompress the JWE plain text", undefined, error)
  }
}

function requireDeflate(zip: CompressionAlgorithm): void {
  if (!zip.equals(CompressionAlgorithm.DEF)) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported compression algorithm: ${zip.name}`)
  }
}

/**
 * @summary Compress and encrypt a JWE plain text under the given header and CEK.
 */
export function sealContent(header: JWEHeader, cek: Uint8Array, clearText: Uint8Array): AuthenticatedCipherText {
  return encryptContent(header.encryptionMethod, cek, compress(header, clearText), aadOf(header))
}

/**
 * @summary Decrypt and inflate the content of a JWE.
 * @throws {@link JoseError} with code `DECRYPT_FAILED` when the IV or tag is missing or
 * authentication fails.
 */
export function openContent(
  header: JWEHeader,
  cek: Uint8Array,
  parts: { iv?: Uint8Array, cipherText: Uint8Array, authTag?: Uint8Array },
): Uint8Array {
  const { iv, authTag, cipherText } = parts
  if (iv === undefined || authTag === undefined) {
    throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'The JWE initialization vector and authentication tag are required')
  }
  return decompress(header, decryptContent(header.encryptionMethod, cek, { iv, cipherText, authTag }, aadOf(header)))
}
