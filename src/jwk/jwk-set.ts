import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { copyJsonObject, getArray, isJsonObject, parseJsonObject, setMember } from '../utils/json'

import { parseJWK } from './jwk'

import type { JsonObject } from '../utils/json'
import type { JWK } from './jwk'

/**
 * @summary Immutable, ordered set of JWKs (RFC 7517 §5) with any additional top-level members.
 */
export class JWKSet {
  readonly keys: readonly JWK[]
  readonly additionalMembers: Readonly<JsonObject>

  constructor(keys: Iterable<JWK> = [], additionalMembers: JsonObject = {}) {
    if (Object.prototype.hasOwnProperty.call(additionalMembers, 'keys')) {
      throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, 'The "keys" member is reserved')
    }
    this.keys = Object.freeze([...keys])
    this.additionalMembers = copyJsonObject(additionalMembers, true)
  }

  /**
   * @summary Parse `{"keys":[...]}`.
   * @throws {@link JoseError} with code `PARSE_ERROR` when `keys` is missing or an entry is
   * not a valid JWK; the message names the position.
   */
  static parse(json: JsonObject): JWKSet {
    const entries = getArray(json, 'keys')
    if (entries === undefined) {
      throw parseError('Missing JSON object member "keys"', 'keys')
    }
    const keys = entries.map((entry, index) => {
      if (!isJsonObject(entry)) {
        throw parseError(`Invalid JWK at position ${index}: not a JSON object`, 'keys')
      }
      try {
        return parseJWK(entry)
      } catch (error) {
        if (error instanceof JoseError) {
          throw new JoseError(
            JoseErrorCode.PARSE_ERROR,
            `Invalid JWK at position ${index}: ${error.message}`,
            { ...error.details, position: index },
            error,
          )
        }
        throw error
      }
    })
    const additional: JsonObject = {}
    for (const [name, value] of Object.entries(json)) {
      if (name !== 'keys') setMember(additional, name, value)
    }
    return new JWKSet(keys, additional)
  }

  static parseString(text: string): JWKSet {
    return JWKSet.parse(parseJsonObject(text, 'JWK set'))
  }

  /** First key with the given `kid`, if any. */
  getKeyByKeyId(kid: string): JWK | undefined {
    return this.keys.find(key => key.keyId === kid)
  }

  /**
   * @summary The public projections of the keys, in order. Keys without one are dropped.
   */
  toPublicJWKSet(): JWKSet {
    const keys: JWK[] = []
    for (const key of this.keys) {
      const pub = key.toPublicJWK()
      if (pub) keys.push(pub)
    }
    return new JWKSet(keys, this.additionalMembers)
  }

  /**
   * @param publicKeysOnly Emit public projections only, dropping symmetric keys. Only an
   * explicit `false` emits private members, so `JSON.stringify(set)` stays public.
   */
  toJSON(publicKeysOnly?: boolean): JsonObject {
    const set = publicKeysOnly === false ? this : this.toPublicJWKSet()
    return { ...copyJsonObject(set.additionalMembers), keys: set.keys.map(key => key.toJSON()) }
  }

  get size(): number {
    return this.keys.length
  }
}
