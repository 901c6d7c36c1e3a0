import { sign, verify } from 'node:crypto'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { curveOf, privateKeyObject, publicKeyObject } from './key-material'

import type { KeyObject } from 'node:crypto'
import type { JWSAlgorithm } from '../algorithms/jws-algorithm'
import type { JWSHeader } from '../header/jws-header'
import type { JWSSigner, JWSVerifier } from '../jose/collaborators'
import type { JWSHeaderFilter } from '../jose/header-filter'
import type { Curve } from '../jwk/curve'
import type { ECKey } from '../jwk/ec-key'

const ECDSA_HASHES: Readonly<Record<string, string>> = { ES256: 'sha256', ES384: 'sha384', ES512: 'sha512' }

function supportedFor(curve: Curve): readonly JWSAlgorithm[] {
  return curve.jwsAlgorithm ? [curve.jwsAlgorithm] : []
}

function hashFor(header: JWSHeader, curve: Curve): string {
  const hash = ECDSA_HASHES[header.algorithm.name]
  if (hash === undefined || !curve.jwsAlgorithm?.equals(header.algorithm)) {
    throw new JoseError(
      JoseErrorCode.UNSUPPORTED_ALG,
      `The "${header.algorithm.name}" algorithm doesn't match the ${curve.name} key`,
    )
  }
  return hash
}

/**
 * @summary ECDSA signer producing JOSE (`R || S`) signatures. The key's curve fixes the
 * algorithm: P-256 signs ES256, P-384 ES384 and P-521 ES512.
 */
export class ECDSASigner implements JWSSigner {
  readonly supportedAlgorithms: readonly JWSAlgorithm[]
  private readonly privateKey: KeyObject
  private readonly curve: Curve

  constructor(key: ECKey | KeyObject) {
    this.privateKey = privateKeyObject(key, 'ec')
    this.curve = curveOf(this.privateKey)
    this.supportedAlgorithms = supportedFor(this.curve)
  }

  sign(header: JWSHeader, signingInput: Uint8Array): Uint8Array {
    const hash = hashFor(header, this.curve)
    return new Uint8Array(sign(hash, signingInput, { key: this.privateKey, dsaEncoding: 'ieee-p1363' }))
  }
}

export class ECDSAVerifier implements JWSVerifier {
  readonly supportedAlgorithms: readonly JWSAlgorithm[]
  private readonly publicKey: KeyObject
  private readonly curve: Curve

  constructor(
    key: ECKey | KeyObject,
    readonly headerFilter?: JWSHeaderFilter,
  ) {
    this.publicKey = publicKeyObject(key, 'ec')
    this.curve = curveOf(this.publicKey)
    this.supportedAlgorithms = supportedFor(this.curve)
  }

  /** A signature of the wrong length for the curve is invalid, not an error. */
  verify(header: JWSHeader, signingInput: Uint8Array, signature: Uint8Array): boolean {
    const hash = hashFor(header, this.curve)
    const bitSize = this.curve.bitSize ?? 0
    if (signature.length !== 2 * Math.ceil(bitSize / 8)) return false
    return verify(hash, signingInput, { key: this.publicKey, dsaEncoding: 'ieee-p1363' }, signature)
  }
}
