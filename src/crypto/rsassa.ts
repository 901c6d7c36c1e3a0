import { constants, sign, verify } from 'node:crypto'

import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { assertRsaKeySize, privateKeyObject, publicKeyObject } from './key-material'

import type { KeyObject, SignKeyObjectInput } from 'node:crypto'
import type { JWSHeader } from '../header/jws-header'
import type { JWSSigner, JWSVerifier } from '../jose/collaborators'
import type { JWSHeaderFilter } from '../jose/header-filter'
import type { RSAKey } from '../jwk/rsa-key'

interface RsaSignatureParams {
  hash: string
  pss: boolean
}

const RSA_SIGNATURES: ReadonlyMap<string, RsaSignatureParams> = new Map([
  ['RS256', { hash: 'sha256', pss: false }],
  ['RS384', { hash: 'sha384', pss: false }],
  ['RS512', { hash: 'sha512', pss: false }],
  ['PS256', { hash: 'sha256', pss: true }],
  ['PS384', { hash: 'sha384', pss: true }],
  ['PS512', { hash: 'sha512', pss: true }],
])

const SALT_LENGTHS: Readonly<Record<string, number>> = { sha256: 32, sha384: 48, sha512: 64 }

function signatureParams(header: JWSHeader): RsaSignatureParams {
  const params = RSA_SIGNATURES.get(header.algorithm.name)
  if (!params) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported RSA signature algorithm: ${header.algorithm.name}`)
  }
  return params
}

function keyInput(key: KeyObject, params: RsaSignatureParams): SignKeyObjectInput {
  return params.pss
    ? { key, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[params.hash] }
    : { key, padding: constants.RSA_PKCS1_PADDING }
}

/**
 * @summary RSASSA-PKCS1-v1_5 (RS*) and RSASSA-PSS (PS*) signer. PSS uses a salt as long
 * as the hash output.
 */
export class RSASSASigner implements JWSSigner {
  readonly supportedAlgorithms: readonly JWSAlgorithm[] = [...JWSAlgorithm.Family.RSA]
  private readonly privateKey: KeyObject

  /**
   * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the key is not a private
   * RSA key of at least 2048 bits.
   */
  constructor(key: RSAKey | KeyObject) {
    this.privateKey = privateKeyObject(key, 'rsa')
    assertRsaKeySize(this.privateKey)
  }

  sign(header: JWSHeader, signingInput: Uint8Array): Uint8Array {
    const params = signatureParams(header)
    return new Uint8Array(sign(params.hash, signingInput, keyInput(this.privateKey, params)))
  }
}

export class RSASSAVerifier implements JWSVerifier {
  readonly supportedAlgorithms: readonly JWSAlgorithm[] = [...JWSAlgorithm.Family.RSA]
  private readonly publicKey: KeyObject

  constructor(
    key: RSAKey | KeyObject,
    readonly headerFilter?: JWSHeaderFilter,
  ) {
    this.publicKey = publicKeyObject(key, 'rsa')
  }

  verify(header: JWSHeader, signingInput: Uint8Array, signature: Uint8Array): boolean {
    const params = signatureParams(header)
    return verify(params.hash, signingInput, keyInput(this.publicKey, params), signature)
  }
}
