import { assertNonEmpty } from '../utils/validation'

/**
 * @summary Implementation requirement of an algorithm or key type (RFC 7518 "Recommended+").
 */
export enum Requirement {
  REQUIRED = 'REQUIRED',
  RECOMMENDED = 'RECOMMENDED',
  OPTIONAL = 'OPTIONAL',
}

/**
 * @summary Base of the open-ended named values used in headers and keys.
 * @remarks
 * Well-known names are exposed as shared constants, but equality is by name, so an
 * independently constructed `new Algorithm('HS256')` equals `JWSAlgorithm.HS256`.
 */
export class Algorithm {
  /** The `none` algorithm of unsecured (plain) objects. */
  static readonly NONE = new Algorithm('none', Requirement.REQUIRED)

  readonly name: string
  readonly requirement?: Requirement

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when the name is empty.
   */
  constructor(name: string, requirement?: Requirement) {
    assertNonEmpty('algorithm name', name)
    this.name = name
    this.requirement = requirement
  }

  equals(other: unknown): boolean {
    return other instanceof Algorithm && other.name === this.name
  }

  toString(): string {
    return this.name
  }

  toJSON(): string {
    return this.name
  }
}

/**
 * @summary Immutable, named group of related algorithms, e.g. all HMAC-SHA JWS algorithms.
 */
export class AlgorithmSet<T extends Algorithm> implements Iterable<T> {
  private readonly members: readonly T[]

  constructor(...members: T[]) {
    this.members = Object.freeze([...members])
  }

  /** Membership by algorithm name. */
  has(alg: Algorithm): boolean {
    return this.members.some(member => member.equals(alg))
  }

  get size(): number {
    return this.members.length
  }

  [Symbol.iterator](): Iterator<T> {
    return this.members[Symbol.iterator]()
  }
}

/**
 * @summary Resolve a name against a table of well-known constants, creating an ad-hoc
 * value for unknown names.
 */
export function resolveNamed<T extends { readonly name: string }>(
  known: readonly T[],
  name: string,
  create: (name: string) => T,
): T {
  return known.find(value => value.name === name) ?? create(name)
}

/**
 * @summary Membership test by name for a mixed list of algorithms.
 */
export function containsAlgorithm(algs: Iterable<Algorithm>, alg: Algorithm): boolean {
  for (const candidate of algs) {
    if (candidate.equals(alg)) return true
  }
  return false
}
