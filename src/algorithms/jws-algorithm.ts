import { Algorithm, AlgorithmSet, Requirement, resolveNamed } from './algorithm'

/**
 * @summary JWS `alg` values (RFC 7518 §3.1).
 */
export class JWSAlgorithm extends Algorithm {
  /** HMAC using SHA-256 */
  static readonly HS256 = new JWSAlgorithm('HS256', Requirement.REQUIRED)
  static readonly HS384 = new JWSAlgorithm('HS384', Requirement.OPTIONAL)
  static readonly HS512 = new JWSAlgorithm('HS512', Requirement.OPTIONAL)
  /** RSASSA-PKCS1-v1_5 using SHA-256 */
  static readonly RS256 = new JWSAlgorithm('RS256', Requirement.RECOMMENDED)
  static readonly RS384 = new JWSAlgorithm('RS384', Requirement.OPTIONAL)
  static readonly RS512 = new JWSAlgorithm('RS512', Requirement.OPTIONAL)
  /** ECDSA using P-256 and SHA-256 */
  static readonly ES256 = new JWSAlgorithm('ES256', Requirement.RECOMMENDED)
  static readonly ES384 = new JWSAlgorithm('ES384', Requirement.OPTIONAL)
  static readonly ES512 = new JWSAlgorithm('ES512', Requirement.OPTIONAL)
  /** RSASSA-PSS using SHA-256 and MGF1 with SHA-256 */
  static readonly PS256 = new JWSAlgorithm('PS256', Requirement.OPTIONAL)
  static readonly PS384 = new JWSAlgorithm('PS384', Requirement.OPTIONAL)
  static readonly PS512 = new JWSAlgorithm('PS512', Requirement.OPTIONAL)

  static readonly Family = Object.freeze({
    HMAC_SHA: new AlgorithmSet(JWSAlgorithm.HS256, JWSAlgorithm.HS384, JWSAlgorithm.HS512),
    RSA: new AlgorithmSet(
      JWSAlgorithm.RS256,
      JWSAlgorithm.RS384,
      JWSAlgorithm.RS512,
      JWSAlgorithm.PS256,
      JWSAlgorithm.PS384,
      JWSAlgorithm.PS512,
    ),
    EC: new AlgorithmSet(JWSAlgorithm.ES256, JWSAlgorithm.ES384, JWSAlgorithm.ES512),
  })

  /**
   * @summary Return the well-known constant for `name`, or a new ad-hoc algorithm.
   */
  static parse(name: string): JWSAlgorithm {
    return resolveNamed(KNOWN, name, n => new JWSAlgorithm(n))
  }
}

const KNOWN: readonly JWSAlgorithm[] = [
  JWSAlgorithm.HS256,
  JWSAlgorithm.HS384,
  JWSAlgorithm.HS512,
  JWSAlgorithm.RS256,
  JWSAlgorithm.RS384,
  JWSAlgorithm.RS512,
  JWSAlgorithm.ES256,
  JWSAlgorithm.ES384,
  JWSAlgorithm.ES512,
  JWSAlgorithm.PS256,
  JWSAlgorithm.PS384,
  JWSAlgorithm.PS512,
]
