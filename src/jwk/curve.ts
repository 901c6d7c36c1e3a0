import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { assertNonEmpty } from '../utils/validation'

/**
 * @summary Elliptic curve of an EC key (`crv`).
 * @remarks
 * Well-known NIST curves carry their field size, the matching ECDSA algorithm and the
 * OpenSSL curve name Node uses. Ad-hoc curves carry only the name.
 */
export class Curve {
  static readonly P_256 = new Curve('P-256', 256, JWSAlgorithm.ES256, 'prime256v1')
  static readonly P_384 = new Curve('P-384', 384, JWSAlgorithm.ES384, 'secp384r1')
  static readonly P_521 = new Curve('P-521', 521, JWSAlgorithm.ES512, 'secp521r1')

  readonly name: string
  readonly bitSize?: number
  readonly jwsAlgorithm?: JWSAlgorithm
  readonly nodeName?: string

  constructor(name: string, bitSize?: number, jwsAlgorithm?: JWSAlgorithm, nodeName?: string) {
    assertNonEmpty('curve name', name)
    this.name = name
    this.bitSize = bitSize
    this.jwsAlgorithm = jwsAlgorithm
    this.nodeName = nodeName
  }

  static parse(name: string): Curve {
    return KNOWN.find(curve => curve.name === name) ?? new Curve(name)
  }

  /**
   * @summary The curve an ECDSA algorithm signs on, if it is one of the known ones.
   */
  static forJWSAlgorithm(alg: JWSAlgorithm): Curve | undefined {
    return KNOWN.find(curve => curve.jwsAlgorithm?.equals(alg) ?? false)
  }

  static fromNodeName(nodeName: string): Curve | undefined {
    return KNOWN.find(curve => curve.nodeName === nodeName)
  }

  equals(other: unknown): boolean {
    return other instanceof Curve && other.name === this.name
  }

  toString(): string {
    return this.name
  }

  toJSON(): string {
    return this.name
  }
}

const KNOWN: readonly Curve[] = [Curve.P_256, Curve.P_384, Curve.P_521]
