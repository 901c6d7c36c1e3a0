import { Inject, Injectable } from '@nestjs/common'

import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWKSelector } from '../jwk/jwk-selector'
import { JWK_SET_SOURCE } from '../module/jose.tokens'

import type { JWK } from '../jwk/jwk'
import type { JWKMatcher } from '../jwk/jwk-matcher'
import type { JWKSet } from '../jwk/jwk-set'
import type { JwkSetSource } from '../keystore/jwk-set-source'
import type { JsonObject } from '../utils/json'

/**
 * @summary Read access to the configured JWK set.
 */
@Injectable()
export class JwkSetService {
  constructor(@Inject(JWK_SET_SOURCE) private readonly source: JwkSetSource) {}

  getJwkSet(): JWKSet {
    return this.source.getJwkSet()
  }

  getActiveKeyId(): string | undefined {
    return this.source.getActiveKeyId()
  }

  /**
   * @summary Keys of the current set matching the criteria, in set order.
   */
  select(matcher: JWKMatcher): JWK[] {
    return new JWKSelector(matcher).select(this.source.getJwkSet())
  }

  /**
   * @summary JSON body for a JWKS endpoint: public projections only, secret keys omitted.
   */
  getPublicJwkSet(): JsonObject {
    return this.source.getJwkSet().toJSON(true)
  }

  findByKeyId(kid: string): JWK | undefined {
    return this.source.getJwkSet().getKeyByKeyId(kid)
  }

  /**
   * @throws {@link JoseError} with code `KEY_NOT_FOUND` when no key has the id.
   */
  getByKeyId(kid: string): JWK {
    const key = this.findByKeyId(kid)
    if (!key) throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, `No key with kid "${kid}"`, { kid })
    return key
  }
}
