import type { JWKSet } from '../jwk/jwk-set'

/**
 * @summary Supplies the JWK set the services select keys from.
 * @remarks
 * Implementations return an immutable snapshot; rotation publishes a new set rather than
 * mutating the old one. They throw {@link JoseError} with code `CONFIG_ERROR` when the
 * configured keys can't be loaded.
 */
export interface JwkSetSource {
  /**
   * @summary The current key set.
   */
  getJwkSet: () => JWKSet
  /**
   * @summary Key id preferred for signing and encryption, if one is configured.
   */
  getActiveKeyId: () => string | undefined
}

export interface EnvJwkSetSourceOptions {
  env?: NodeJS.ProcessEnv
  /** Variable holding the JWK set JSON document (default: `JOSE_JWKS`) */
  jwksVar?: string
  /** Variable holding the active key id (default: `JOSE_ACTIVE_KID`) */
  activeKidVar?: string
}
