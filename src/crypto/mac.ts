import { createHmac } from 'node:crypto'

import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { bytesEqual } from '../utils/bytes'
import { assertMinKeyLength } from '../utils/validation'

import { secretBytes } from './key-material'

import type { JWSHeader } from '../header/jws-header'
import type { JWSHeaderFilter } from '../jose/header-filter'
import type { JWSSigner, JWSVerifier } from '../jose/collaborators'
import type { OctetSequenceKey } from '../jwk/octet-sequence-key'

const HMAC_HASHES: ReadonlyMap<string, { hash: string, bits: number }> = new Map([
  ['HS256', { hash: 'sha256', bits: 256 }],
  ['HS384', { hash: 'sha384', bits: 384 }],
  ['HS512', { hash: 'sha512', bits: 512 }],
])

function hmac(header: JWSHeader, secret: Uint8Array, input: Uint8Array): Uint8Array {
  const params = HMAC_HASHES.get(header.algorithm.name)
  if (!params) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported HMAC algorithm: ${header.algorithm.name}`)
  }
  assertMinKeyLength(`The secret for ${header.algorithm.name}`, secret, params.bits)
  return new Uint8Array(createHmac(params.hash, secret).update(input).digest())
}

/**
 * @summary HMAC signer for HS256, HS384 and HS512. The secret must be at least as long as
 * the hash output.
 */
export class MACSigner implements JWSSigner {
  readonly supportedAlgorithms: readonly JWSAlgorithm[] = [...JWSAlgorithm.Family.HMAC_SHA]
  private readonly secret: Uint8Array

  /**
   * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when shorter than 256 bits.
   */
  constructor(secret: OctetSequenceKey | Uint8Array) {
    this.secret = secretBytes(secret)
    assertMinKeyLength('The HMAC secret', this.secret, 256)
  }

  sign(header: JWSHeader, signingInput: Uint8Array): Uint8Array {
    return hmac(header, this.secret, signingInput)
  }
}

export class MACVerifier implements JWSVerifier {
  readonly supportedAlgorithms: readonly JWSAlgorithm[] = [...JWSAlgorithm.Family.HMAC_SHA]
  private readonly secret: Uint8Array

  constructor(
    secret: OctetSequenceKey | Uint8Array,
    readonly headerFilter?: JWSHeaderFilter,
  ) {
    this.secret = secretBytes(secret)
    assertMinKeyLength('The HMAC secret', this.secret, 256)
  }

  /** Constant-time comparison of the expected and given MAC. */
  verify(header: JWSHeader, signingInput: Uint8Array, signature: Uint8Array): boolean {
    return bytesEqual(hmac(header, this.secret, signingInput), signature)
  }
}
