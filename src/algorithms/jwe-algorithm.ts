import { Algorithm, AlgorithmSet, Requirement, resolveNamed } from './algorithm'

/**
 * @summary JWE key management `alg` values (RFC 7518 §4.1).
 */
export class JWEAlgorithm extends Algorithm {
  static readonly RSA1_5 = new JWEAlgorithm('RSA1_5', Requirement.REQUIRED)
  static readonly RSA_OAEP = new JWEAlgorithm('RSA-OAEP', Requirement.RECOMMENDED)
  static readonly RSA_OAEP_256 = new JWEAlgorithm('RSA-OAEP-256', Requirement.RECOMMENDED)
  static readonly A128KW = new JWEAlgorithm('A128KW', Requirement.RECOMMENDED)
  static readonly A192KW = new JWEAlgorithm('A192KW', Requirement.OPTIONAL)
  static readonly A256KW = new JWEAlgorithm('A256KW', Requirement.RECOMMENDED)
  /** Direct use of a shared symmetric key as the content encryption key */
  static readonly DIR = new JWEAlgorithm('dir', Requirement.RECOMMENDED)
  static readonly ECDH_ES = new JWEAlgorithm('ECDH-ES', Requirement.RECOMMENDED)
  static readonly ECDH_ES_A128KW = new JWEAlgorithm('ECDH-ES+A128KW', Requirement.RECOMMENDED)
  static readonly ECDH_ES_A192KW = new JWEAlgorithm('ECDH-ES+A192KW', Requirement.OPTIONAL)
  static readonly ECDH_ES_A256KW = new JWEAlgorithm('ECDH-ES+A256KW', Requirement.RECOMMENDED)
  static readonly A128GCMKW = new JWEAlgorithm('A128GCMKW', Requirement.OPTIONAL)
  static readonly A192GCMKW = new JWEAlgorithm('A192GCMKW', Requirement.OPTIONAL)
  static readonly A256GCMKW = new JWEAlgorithm('A256GCMKW', Requirement.OPTIONAL)
  static readonly PBES2_HS256_A128KW = new JWEAlgorithm('PBES2-HS256+A128KW', Requirement.OPTIONAL)
  static readonly PBES2_HS384_A192KW = new JWEAlgorithm('PBES2-HS384+A192KW', Requirement.OPTIONAL)
  static readonly PBES2_HS512_A256KW = new JWEAlgorithm('PBES2-HS512+A256KW', Requirement.OPTIONAL)

  static readonly Family = Object.freeze({
    RSA: new AlgorithmSet(JWEAlgorithm.RSA1_5, JWEAlgorithm.RSA_OAEP, JWEAlgorithm.RSA_OAEP_256),
    AES_KW: new AlgorithmSet(JWEAlgorithm.A128KW, JWEAlgorithm.A192KW, JWEAlgorithm.A256KW),
    ECDH_ES: new AlgorithmSet(
      JWEAlgorithm.ECDH_ES,
      JWEAlgorithm.ECDH_ES_A128KW,
      JWEAlgorithm.ECDH_ES_A192KW,
      JWEAlgorithm.ECDH_ES_A256KW,
    ),
    AES_GCM_KW: new AlgorithmSet(
      JWEAlgorithm.A128GCMKW,
      JWEAlgorithm.A192GCMKW,
      JWEAlgorithm.A256GCMKW,
    ),
    PBES2: new AlgorithmSet(
      JWEAlgorithm.PBES2_HS256_A128KW,
      JWEAlgorithm.PBES2_HS384_A192KW,
      JWEAlgorithm.PBES2_HS512_A256KW,
    ),
  })

  static parse(name: string): JWEAlgorithm {
    return resolveNamed(KNOWN, name, n => new JWEAlgorithm(n))
  }
}

const KNOWN: readonly JWEAlgorithm[] = [
  JWEAlgorithm.RSA1_5,
  JWEAlgorithm.RSA_OAEP,
  JWEAlgorithm.RSA_OAEP_256,
  JWEAlgorithm.A128KW,
  JWEAlgorithm.A192KW,
  JWEAlgorithm.A256KW,
  JWEAlgorithm.DIR,
  JWEAlgorithm.ECDH_ES,
  JWEAlgorithm.ECDH_ES_A128KW,
  JWEAlgorithm.ECDH_ES_A192KW,
  JWEAlgorithm.ECDH_ES_A256KW,
  JWEAlgorithm.A128GCMKW,
  JWEAlgorithm.A192GCMKW,
  JWEAlgorithm.A256GCMKW,
  JWEAlgorithm.PBES2_HS256_A128KW,
  JWEAlgorithm.PBES2_HS384_A192KW,
  JWEAlgorithm.PBES2_HS512_A256KW,
]
