import { Algorithm, Requirement, resolveNamed } from './algorithm'

/**
 * @summary Key family of a JWK, serialized as `kty`.
 */
export class AlgorithmFamily extends Algorithm {
  /** Elliptic curve */
  static readonly EC = new AlgorithmFamily('EC', Requirement.RECOMMENDED)
  static readonly RSA = new AlgorithmFamily('RSA', Requirement.REQUIRED)
  /** Octet sequence, used for symmetric keys */
  static readonly OCT = new AlgorithmFamily('oct', Requirement.OPTIONAL)

  static parse(name: string): AlgorithmFamily {
    return resolveNamed(
      [AlgorithmFamily.EC, AlgorithmFamily.RSA, AlgorithmFamily.OCT],
      name,
      n => new AlgorithmFamily(n),
    )
  }
}
