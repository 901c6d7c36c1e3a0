import { assertNonEmpty } from '../utils/validation'

/**
 * @summary JWE `zip` values. Only DEFLATE (RFC 1951) is registered.
 */
export class CompressionAlgorithm {
  static readonly DEF = new CompressionAlgorithm('DEF')

  readonly name: string

  constructor(name: string) {
    assertNonEmpty('compression algorithm name', name)
    this.name = name
  }

  static parse(name: string): CompressionAlgorithm {
    return name === CompressionAlgorithm.DEF.name
      ? CompressionAlgorithm.DEF
      : new CompressionAlgorithm(name)
  }

  equals(other: unknown): boolean {
    return other instanceof CompressionAlgorithm && other.name === this.name
  }

  toString(): string {
    return this.name
  }

  toJSON(): string {
    return this.name
  }
}
