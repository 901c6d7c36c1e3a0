import { JWKSet } from './jwk-set'

import type { JWK } from './jwk'
import type { JWKMatcher } from './jwk-matcher'

/**
 * @summary Applies a {@link JWKMatcher} to a key set, keeping the set's order.
 */
export class JWKSelector {
  constructor(readonly matcher: JWKMatcher) {}

  /** Matching keys; empty when none match. */
  select(set: JWKSet | Iterable<JWK>): JWK[] {
    const keys = set instanceof JWKSet ? set.keys : set
    const out: JWK[] = []
    for (const key of keys) {
      if (this.matcher.matches(key)) out.push(key)
    }
    return out
  }
}
