import { assertNonEmpty } from '../utils/validation'

/**
 * @summary Media type of a JOSE object, carried in the `typ` header parameter.
 */
export class JOSEObjectType {
  static readonly JOSE = new JOSEObjectType('JOSE')
  static readonly JOSE_JSON = new JOSEObjectType('JOSE+JSON')
  static readonly JWT = new JOSEObjectType('JWT')

  readonly type: string

  constructor(type: string) {
    assertNonEmpty('object type', type)
    this.type = type
  }

  static parse(type: string): JOSEObjectType {
    return (
      [JOSEObjectType.JOSE, JOSEObjectType.JOSE_JSON, JOSEObjectType.JWT].find(
        known => known.type === type,
      ) ?? new JOSEObjectType(type)
    )
  }

  equals(other: unknown): boolean {
    return other instanceof JOSEObjectType && other.type === this.type
  }

  toString(): string {
    return this.type
  }

  toJSON(): string {
    return this.type
  }
}
