import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { Curve } from '../jwk/curve'
import { OctetSequenceKey } from '../jwk/octet-sequence-key'

import type { KeyObject } from 'node:crypto'
import type { ECKey } from '../jwk/ec-key'
import type { RSAKey } from '../jwk/rsa-key'

/** Smallest RSA modulus accepted for signing and key encryption. */
export const MIN_RSA_KEY_BITS = 2048

/**
 * @summary Secret bytes of a symmetric key given as a JWK or raw bytes.
 */
export function secretBytes(key: OctetSequenceKey | Uint8Array): Uint8Array {
  return key instanceof OctetSequenceKey ? key.toBytes() : new Uint8Array(key)
}

/**
 * @summary Private key object of an RSA or EC key.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the key is public or of
 * another type.
 */
export function privateKeyObject(key: RSAKey | ECKey | KeyObject, type: 'rsa' | 'ec'): KeyObject {
  const keyObject = 'kty' in key ? key.toKeyObject() : key
  if (keyObject.type !== 'private' || keyObject.asymmetricKeyType !== type) {
    throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, `Expected a private ${type.toUpperCase()} key`)
  }
  return keyObject
}

/**
 * @summary Public key object of an RSA or EC key; private keys yield their public half.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` for a key of another type.
 */
export function publicKeyObject(key: RSAKey | ECKey | KeyObject, type: 'rsa' | 'ec'): KeyObject {
  const keyObject = 'kty' in key ? key.toPublicKeyObject() : key
  if (keyObject.type === 'secret' || keyObject.asymmetricKeyType !== type) {
    throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, `Expected an ${type.toUpperCase()} key`)
  }
  return keyObject
}

/**
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the modulus is too short.
 */
export function assertRsaKeySize(keyObject: KeyObject): void {
  const bits = keyObject.asymmetricKeyDetails?.modulusLength ?? 0
  if (bits < MIN_RSA_KEY_BITS) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `RSA key must be at least ${MIN_RSA_KEY_BITS} bits (got ${bits} bits)`,
    )
  }
}

/**
 * @summary The JWK curve of an EC key object.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` for curves JOSE doesn't define.
 */
export function curveOf(keyObject: KeyObject): Curve {
  const nodeName = keyObject.asymmetricKeyDetails?.namedCurve
  const curve = nodeName === undefined ? undefined : Curve.fromNodeName(nodeName)
  if (!curve) {
    throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, `Unsupported EC curve: ${String(nodeName)}`)
  }
  return curve
}
