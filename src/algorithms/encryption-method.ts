import { Algorithm, AlgorithmSet, Requirement, resolveNamed } from './algorithm'

/**
 * @summary JWE content encryption `enc` values (RFC 7518 §5.1).
 * @remarks `cekBitLength` is the content encryption key length, 0 for ad-hoc methods.
 */
export class EncryptionMethod extends Algorithm {
  static readonly A128CBC_HS256 = new EncryptionMethod('A128CBC-HS256', Requirement.REQUIRED, 256)
  static readonly A192CBC_HS384 = new EncryptionMethod('A192CBC-HS384', Requirement.OPTIONAL, 384)
  static readonly A256CBC_HS512 = new EncryptionMethod('A256CBC-HS512', Requirement.REQUIRED, 512)
  static readonly A128GCM = new EncryptionMethod('A128GCM', Requirement.RECOMMENDED, 128)
  static readonly A192GCM = new EncryptionMethod('A192GCM', Requirement.OPTIONAL, 192)
  static readonly A256GCM = new EncryptionMethod('A256GCM', Requirement.RECOMMENDED, 256)

  static readonly Family = Object.freeze({
    AES_CBC_HMAC_SHA: new AlgorithmSet(
      EncryptionMethod.A128CBC_HS256,
      EncryptionMethod.A192CBC_HS384,
      EncryptionMethod.A256CBC_HS512,
    ),
    AES_GCM: new AlgorithmSet(
      EncryptionMethod.A128GCM,
      EncryptionMethod.A192GCM,
      EncryptionMethod.A256GCM,
    ),
  })

  readonly cekBitLength: number

  constructor(name: string, requirement?: Requirement, cekBitLength = 0) {
    super(name, requirement)
    this.cekBitLength = cekBitLength
  }

  static parse(name: string): EncryptionMethod {
    return resolveNamed(KNOWN, name, n => new EncryptionMethod(n))
  }
}

const KNOWN: readonly EncryptionMethod[] = [
  EncryptionMethod.A128CBC_HS256,
  EncryptionMethod.A192CBC_HS384,
  EncryptionMethod.A256CBC_HS512,
  EncryptionMethod.A128GCM,
  EncryptionMethod.A192GCM,
  EncryptionMethod.A256GCM,
]
