import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { parseJsonObject, requireString } from '../utils/json'

import { Curve } from './curve'
import { ECKey, ECKeyBuilder } from './ec-key'
import { OctetSequenceKey, OctetSequenceKeyBuilder } from './octet-sequence-key'
import { RSAKey, RSAKeyBuilder } from './rsa-key'

import type { JsonWebKey, KeyObject } from 'node:crypto'
import type { JsonObject } from '../utils/json'
import type { JWKCommonParams } from './base-jwk'

/**
 * A JSON Web Key, discriminated by `kty`.
 */
export type JWK = ECKey | RSAKey | OctetSequenceKey

/**
 * @summary Parse a JWK JSON object, dispatching on `kty`.
 * @throws {@link JoseError} with code `PARSE_ERROR` when `kty` is missing or unsupported,
 * or a family-specific member is missing or malformed.
 */
export function parseJWK(json: JsonObject): JWK {
  const kty = requireString(json, 'kty')
  switch (kty) {
    case 'EC':
      return ECKey.parse(json)
    case 'RSA':
      return RSAKey.parse(json)
    case 'oct':
      return OctetSequenceKey.parse(json)
    default:
      throw parseError(`Unsupported key type "kty": ${kty}`, 'kty')
  }
}

/**
 * @summary Parse a JWK from its JSON text.
 * @throws {@link JoseError} with code `PARSE_ERROR` on invalid JSON or key members.
 */
export function parseJWKString(text: string): JWK {
  return parseJWK(parseJsonObject(text, 'JWK'))
}

/**
 * @summary Copy of a key with its common members replaced.
 */
export function withCommonParams(key: JWK, params: JWKCommonParams): JWK {
  switch (key.kty) {
    case 'EC':
      return ECKeyBuilder.from(key).commonParams(params).build()
    case 'RSA':
      return RSAKeyBuilder.from(key).commonParams(params).build()
    case 'oct':
      return OctetSequenceKeyBuilder.from(key).commonParams(params).build()
  }
}

/**
 * @summary Convert a Node key object (EC, RSA or secret) to a JWK.
 * @param keyObject Private, public or secret key.
 * @param params Common members to attach, such as `kid` and `use`.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` for key types a JWK can't carry.
 */
export function jwkFromKeyObject(keyObject: KeyObject, params: JWKCommonParams = {}): JWK {
  if (keyObject.type === 'secret') {
    const bytes = keyObject.export()
    return OctetSequenceKeyBuilder.fromBytes(new Uint8Array(bytes)).commonParams(params).build()
  }
  const exported: JsonWebKey = keyObject.export({ format: 'jwk' })
  const member = (name: string): string => {
    const value = exported[name]
    if (typeof value !== 'string') {
      throw new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, `Exported key lacks the "${name}" member`)
    }
    return value
  }
  const optional = (name: string): string | undefined => {
    const value = exported[name]
    return typeof value === 'string' ? value : undefined
  }
  switch (exported.kty) {
    case 'EC':
      return new ECKeyBuilder(Curve.parse(member('crv')), member('x'), member('y'))
        .privateKey(optional('d'))
        .commonParams(params)
        .build()
    case 'RSA': {
      const builder = new RSAKeyBuilder(member('n'), member('e')).commonParams(params)
      if (keyObject.type === 'private') {
        builder.privateExponent(member('d')).crtParams({
          p: member('p'),
          q: member('q'),
          dp: member('dp'),
          dq: member('dq'),
          qi: member('qi'),
        })
      }
      return builder.build()
    }
    default:
      throw new JoseError(
        JoseErrorCode.INVALID_KEY_MATERIAL,
        `Unsupported key type for JWK conversion: ${String(exported.kty)}`,
      )
  }
}
