import { assertNonEmpty } from '../utils/validation'

/**
 * @summary Intended use of a public key (`use`).
 */
export class KeyUse {
  static readonly SIGNATURE = new KeyUse('sig')
  static readonly ENCRYPTION = new KeyUse('enc')

  readonly identifier: string

  constructor(identifier: string) {
    assertNonEmpty('key use identifier', identifier)
    this.identifier = identifier
  }

  static parse(identifier: string): KeyUse {
    if (identifier === KeyUse.SIGNATURE.identifier) return KeyUse.SIGNATURE
    if (identifier === KeyUse.ENCRYPTION.identifier) return KeyUse.ENCRYPTION
    return new KeyUse(identifier)
  }

  equals(other: unknown): boolean {
    return other instanceof KeyUse && other.identifier === this.identifier
  }

  toString(): string {
    return this.identifier
  }

  toJSON(): string {
    return this.identifier
  }
}
