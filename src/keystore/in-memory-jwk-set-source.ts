import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWKSet } from '../jwk/jwk-set'

import type { JwkSetSource } from './jwk-set-source'
import type { JWK } from '../jwk/jwk'

/**
 * @summary Ephemeral key-set source for unit tests and programmatic rotation.
 * @remarks
 * Every mutation publishes a new immutable {@link JWKSet}; sets handed out earlier keep
 * their keys.
 */
export class InMemoryJwkSetSource implements JwkSetSource {
  private set: JWKSet
  private activeKeyId?: string

  constructor(keys: Iterable<JWK> = [], activeKeyId?: string) {
    this.set = new JWKSet(keys)
    this.activeKeyId = activeKeyId
  }

  getJwkSet(): JWKSet {
    return this.set
  }

  getActiveKeyId(): string | undefined {
    return this.activeKeyId
  }

  /**
   * @summary Append a key, replacing any key with the same `kid`.
   */
  addKey(key: JWK): this {
    const kept = key.keyId === undefined ? this.set.keys : this.set.keys.filter(k => k.keyId !== key.keyId)
    this.set = new JWKSet([...kept, key], this.set.additionalMembers)
    return this
  }

  /**
   * @throws {@link JoseError} with code `KEY_NOT_FOUND` when no key has the id.
   */
  removeKey(kid: string): this {
    if (!this.set.getKeyByKeyId(kid)) {
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, `No key with kid "${kid}"`, { kid })
    }
    this.set = new JWKSet(this.set.keys.filter(key => key.keyId !== kid), this.set.additionalMembers)
    if (this.activeKeyId === kid) this.activeKeyId = undefined
    return this
  }

  /**
   * @summary Point new signatures and encryptions at another key.
   * @throws {@link JoseError} with code `KEY_NOT_FOUND` when no key has the id.
   */
  setActiveKeyId(kid: string | undefined): void {
    if (kid !== undefined && !this.set.getKeyByKeyId(kid)) {
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, `No key with kid "${kid}"`, { kid })
    }
    this.activeKeyId = kid
  }

  /** Replace the whole set. */
  replace(set: JWKSet, activeKeyId?: string): void {
    this.set = set
    this.activeKeyId = activeKeyId
  }
}
