import { AlgorithmFamily } from '../algorithms/algorithm-family'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'

import { Curve } from './curve'
import { KeyUse } from './key-use'

import type { Algorithm } from '../algorithms/algorithm'
import type { JWEHeader } from '../header/jwe-header'
import type { JWSHeader } from '../header/jws-header'
import type { JWK } from './jwk'
import type { KeyOperation } from './key-operation'

/**
 * Selection criteria. Every criterion is optional; a key matches when it satisfies
 * all present ones. In the set criteria `null` stands for "unspecified" and matches keys
 * that lack the attribute.
 */
export interface JWKMatcherCriteria {
  families?: Iterable<AlgorithmFamily>
  uses?: Iterable<KeyUse | null>
  operations?: Iterable<KeyOperation | null>
  algorithms?: Iterable<Algorithm | null>
  ids?: Iterable<string | null>
  privateOnly?: boolean
  publicOnly?: boolean
  minSizeBits?: number
  maxSizeBits?: number
  curves?: Iterable<Curve | null>
}

interface Named {
  equals(other: unknown): boolean
}

function containsValue<T extends Named>(set: readonly (T | null)[], value: T | undefined): boolean {
  if (value === undefined) return set.includes(null)
  return set.some(member => member !== null && member.equals(value))
}

/** Smallest secret an HMAC algorithm accepts. */
const HMAC_MIN_BITS: ReadonlyMap<string, number> = new Map([
  ['HS256', 256],
  ['HS384', 384],
  ['HS512', 512],
])

/** Key encryption key size of the AES key wrap algorithms. */
const KEY_WRAP_BITS: ReadonlyMap<string, number> = new Map([
  ['A128KW', 128],
  ['A192KW', 192],
  ['A256KW', 256],
  ['A128GCMKW', 128],
  ['A192GCMKW', 192],
  ['A256GCMKW', 256],
])

function freeze<T>(values: Iterable<T> | undefined): readonly T[] | undefined {
  return values === undefined ? undefined : Object.freeze([...values])
}

/**
 * @summary Immutable multi-criteria key matcher used to find keys during rotation.
 * @remarks `privateOnly` and `publicOnly` may both be set; nothing matches then.
 */
export class JWKMatcher {
  readonly families?: readonly AlgorithmFamily[]
  readonly uses?: readonly (KeyUse | null)[]
  readonly operations?: readonly (KeyOperation | null)[]
  readonly algorithms?: readonly (Algorithm | null)[]
  readonly ids?: readonly (string | null)[]
  readonly privateOnly: boolean
  readonly publicOnly: boolean
  readonly minSizeBits: number
  readonly maxSizeBits: number
  readonly curves?: readonly (Curve | null)[]

  constructor(criteria: JWKMatcherCriteria = {}) {
    this.families = freeze(criteria.families)
    this.uses = freeze(criteria.uses)
    this.operations = freeze(criteria.operations)
    this.algorithms = freeze(criteria.algorithms)
    this.ids = freeze(criteria.ids)
    this.privateOnly = criteria.privateOnly ?? false
    this.publicOnly = criteria.publicOnly ?? false
    this.minSizeBits = criteria.minSizeBits ?? 0
    this.maxSizeBits = criteria.maxSizeBits ?? 0
    this.curves = freeze(criteria.curves)
  }

  /**
   * @summary Matcher for the keys that may verify (or create) a JWS with this header.
   * @returns undefined when the algorithm belongs to no known family.
   */
  static forJWSHeader(header: JWSHeader): JWKMatcher | undefined {
    const alg = header.algorithm
    const ids = header.keyId === undefined ? undefined : [header.keyId]
    if (JWSAlgorithm.Family.HMAC_SHA.has(alg)) {
      return new JWKMatcher({
        families: [AlgorithmFamily.OCT],
        ids,
        privateOnly: true,
        algorithms: [alg, null],
        minSizeBits: HMAC_MIN_BITS.get(alg.name),
      })
    }
    if (JWSAlgorithm.Family.RSA.has(alg)) {
      return new JWKMatcher({
        families: [AlgorithmFamily.RSA],
        ids,
        uses: [KeyUse.SIGNATURE, null],
        algorithms: [alg, null],
      })
    }
    if (JWSAlgorithm.Family.EC.has(alg)) {
      const curve = Curve.forJWSAlgorithm(alg)
      return new JWKMatcher({
        families: [AlgorithmFamily.EC],
        ids,
        uses: [KeyUse.SIGNATURE, null],
        algorithms: [alg, null],
        curves: curve ? [curve] : undefined,
      })
    }
    return undefined
  }

  /**
   * @summary Matcher for the keys that may decrypt (or encrypt) a JWE with this header.
   * @returns undefined when the algorithm belongs to no known family.
   */
  static forJWEHeader(header: JWEHeader): JWKMatcher | undefined {
    const alg = header.algorithm
    const ids = header.keyId === undefined ? undefined : [header.keyId]
    if (JWEAlgorithm.Family.RSA.has(alg)) {
      return new JWKMatcher({
        families: [AlgorithmFamily.RSA],
        ids,
        uses: [KeyUse.ENCRYPTION, null],
        algorithms: [alg, null],
      })
    }
    if (JWEAlgorithm.Family.ECDH_ES.has(alg)) {
      const curve = header.ephemeralPublicKey?.curve
      return new JWKMatcher({
        families: [AlgorithmFamily.EC],
        ids,
        uses: [KeyUse.ENCRYPTION, null],
        algorithms: [alg, null],
        curves: curve ? [curve] : undefined,
      })
    }
    if (JWEAlgorithm.Family.AES_KW.has(alg) || JWEAlgorithm.Family.AES_GCM_KW.has(alg)) {
      const bits = KEY_WRAP_BITS.get(alg.name)
      return new JWKMatcher({
        families: [AlgorithmFamily.OCT],
        ids,
        privateOnly: true,
        algorithms: [alg, null],
        minSizeBits: bits,
        maxSizeBits: bits,
      })
    }
    if (JWEAlgorithm.DIR.equals(alg)) {
      const bits = header.encryptionMethod.cekBitLength
      return new JWKMatcher({
        families: [AlgorithmFamily.OCT],
        ids,
        privateOnly: true,
        algorithms: [alg, null],
        minSizeBits: bits,
        maxSizeBits: bits,
      })
    }
    return undefined
  }

  matches(key: JWK): boolean {
    if (this.families && !this.families.some(family => family.equals(key.family))) return false
    if (this.uses && !containsValue(this.uses, key.use)) return false
    if (this.operations && !this.matchesOperations(key.keyOperations)) return false
    if (this.algorithms && !containsValue(this.algorithms, key.algorithm)) return false
    if (this.ids) {
      const kid = key.keyId
      if (!this.ids.includes(kid === undefined ? null : kid)) return false
    }
    if (this.privateOnly && !key.isPrivate()) return false
    if (this.publicOnly && key.isPrivate()) return false
    if (this.minSizeBits > 0 && key.size() < this.minSizeBits) return false
    if (this.maxSizeBits > 0 && key.size() > this.maxSizeBits) return false
    if (this.curves && !containsValue(this.curves, key.kty === 'EC' ? key.curve : undefined)) return false
    return true
  }

  private matchesOperations(ops: readonly KeyOperation[] | undefined): boolean {
    const criterion = this.operations ?? []
    if (ops === undefined) return criterion.includes(null)
    return ops.every(op => criterion.includes(op))
  }
}
