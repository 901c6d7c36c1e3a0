import { createHash, diffieHellman, generateKeyPairSync } from 'node:crypto'

import { EncryptionMethod } from '../algorithms/encryption-method'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWEHeaderBuilder } from '../header/jwe-header'
import { jwkFromKeyObject } from '../jwk/jwk'
import { concatBytes, zeroize } from '../utils/bytes'
import { base64UrlDecode, toUtf8Bytes } from '../utils/encoding'

import { wrapKey, unwrapKey } from './aes-kw'
import { SUPPORTED_ENCRYPTION_METHODS, generateCek, openContent, sealContent } from './content-cipher'
import { curveOf, privateKeyObject, publicKeyObject } from './key-material'

import type { KeyObject } from 'node:crypto'
import type { JWEHeader } from '../header/jwe-header'
import type { JWECryptoParts, JWEDecrypter, JWEEncrypter } from '../jose/collaborators'
import type { JWEHeaderFilter } from '../jose/header-filter'
import type { Curve } from '../jwk/curve'
import type { ECKey } from '../jwk/ec-key'

const ECDH_ALGORITHMS: readonly JWEAlgorithm[] = [...JWEAlgorithm.Family.ECDH_ES]

const WRAP_KEY_BITS: ReadonlyMap<string, number> = new Map([
  [JWEAlgorithm.ECDH_ES_A128KW.name, 128],
  [JWEAlgorithm.ECDH_ES_A192KW.name, 192],
  [JWEAlgorithm.ECDH_ES_A256KW.name, 256],
])

function uint32BigEndian(value: number): Uint8Array {
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value)
  return out
}

function lengthPrefixed(data: Uint8Array): Uint8Array {
  return concatBytes(uint32BigEndian(data.length), data)
}

/**
 * @summary Concat KDF with SHA-256 (NIST SP 800-56A §5.8.1, RFC 7518 §4.6.2).
 */
export function concatKdf(
  sharedSecret: Uint8Array,
  keyBits: number,
  algorithmId: string,
  partyUInfo: Uint8Array,
  partyVInfo: Uint8Array,
): Uint8Array {
  const otherInfo = concatBytes(
    lengthPrefixed(toUtf8Bytes(algorithmId)),
    lengthPrefixed(partyUInfo),
    lengthPrefixed(partyVInfo),
    uint32BigEndian(keyBits),
  )
  const rounds = Math.ceil(keyBits / 256)
  const blocks: Uint8Array[] = []
  for (let counter = 1; counter <= rounds; counter++) {
    blocks.push(createHash('sha256').update(concatBytes(uint32BigEndian(counter), sharedSecret, otherInfo)).digest())
  }
  return concatBytes(...blocks).slice(0, keyBits / 8)
}

/**
 * @summary The key derived from the shared secret: the CEK for direct ECDH-ES, the key
 * encryption key for the `+AxxxKW` variants.
 */
function deriveKey(header: JWEHeader, sharedSecret: Uint8Array): Uint8Array {
  const alg = header.algorithm
  const apu = header.agreementPartyUInfo === undefined ? new Uint8Array() : base64UrlDecode(header.agreementPartyUInfo, 'apu')
  const apv = header.agreementPartyVInfo === undefined ? new Uint8Array() : base64UrlDecode(header.agreementPartyVInfo, 'apv')
  if (alg.equals(JWEAlgorithm.ECDH_ES)) {
    const enc = EncryptionMethod.parse(header.encryptionMethod.name)
    return concatKdf(sharedSecret, enc.cekBitLength, enc.name, apu, apv)
  }
  const wrapBits = WRAP_KEY_BITS.get(alg.name)
  if (wrapBits === undefined) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported ECDH algorithm: ${alg.name}`)
  }
  return concatKdf(sharedSecret, wrapBits, alg.name, apu, apv)
}

/**
 * @summary ECDH-ES key agreement, direct or with AES key wrap, using an ephemeral key on
 * the recipient's curve. The ephemeral public key is added to the header as `epk`.
 */
export class ECDHEncrypter implements JWEEncrypter {
  readonly supportedAlgorithms = ECDH_ALGORITHMS
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly publicKey: KeyObject
  private readonly curve: Curve

  constructor(key: ECKey | KeyObject) {
    this.publicKey = publicKeyObject(key, 'ec')
    this.curve = curveOf(this.publicKey)
  }

  encrypt(header: JWEHeader, clearText: Uint8Array): JWECryptoParts {
    const ephemeral = generateKeyPairSync('ec', { namedCurve: this.curve.nodeName ?? this.curve.name })
    const epk = jwkFromKeyObject(ephemeral.publicKey)
    if (epk.kty !== 'EC') {
      throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, 'Ephemeral key is not an EC key')
    }
    const updated = JWEHeaderBuilder.from(header).ephemeralPublicKey(epk).build()
    const sharedSecret = new Uint8Array(diffieHellman({ privateKey: ephemeral.privateKey, publicKey: this.publicKey }))
    const derived = deriveKey(updated, sharedSecret)
    zeroize(sharedSecret)
    if (updated.algorithm.equals(JWEAlgorithm.ECDH_ES)) {
      try {
        return { header: updated, ...sealContent(updated, derived, clearText) }
      } finally {
        zeroize(derived)
      }
    }
    const cek = generateCek(updated.encryptionMethod)
    try {
      return { header: updated, encryptedKey: wrapKey(derived, cek), ...sealContent(updated, cek, clearText) }
    } finally {
      zeroize(cek)
      zeroize(derived)
    }
  }
}

export class ECDHDecrypter implements JWEDecrypter {
  readonly supportedAlgorithms = ECDH_ALGORITHMS
  readonly supportedEncryptionMethods: readonly EncryptionMethod[] = SUPPORTED_ENCRYPTION_METHODS
  private readonly privateKey: KeyObject
  private readonly curve: Curve

  constructor(
    key: ECKey | KeyObject,
    readonly headerFilter?: JWEHeaderFilter,
  ) {
    this.privateKey = privateKeyObject(key, 'ec')
    this.curve = curveOf(this.privateKey)
  }

  /**
   * @throws {@link JoseError} with code `DECRYPT_FAILED` when `epk` is missing or on another
   * curve, or authentication fails.
   */
  decrypt(header: JWEHeader, parts: JWECryptoParts): Uint8Array {
    const epk = header.ephemeralPublicKey
    if (!epk || !epk.curve.equals(this.curve)) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Missing or mismatched ephemeral public key "epk"')
    }
    const sharedSecret = new Uint8Array(diffieHellman({ privateKey: this.privateKey, publicKey: epk.toPublicKeyObject() }))
    const derived = deriveKey(header, sharedSecret)
    zeroize(sharedSecret)
    if (header.algorithm.equals(JWEAlgorithm.ECDH_ES)) {
      if (parts.encryptedKey !== undefined) {
        throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Unexpected encrypted key for direct key agreement')
      }
      try {
        return openContent(header, derived, parts)
      } finally {
        zeroize(derived)
      }
    }
    if (parts.encryptedKey === undefined) {
      throw new JoseError(JoseErrorCode.DECRYPT_FAILED, 'Missing JWE encrypted key')
    }
    const cek = unwrapKey(derived, parts.encryptedKey)
    zeroize(derived)
    try {
      return openContent(header, cek, parts)
    } finally {
      zeroize(cek)
    }
  }
}
