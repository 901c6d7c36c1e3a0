import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWKSet } from '../jwk/jwk-set'

import type { EnvJwkSetSourceOptions, JwkSetSource } from './jwk-set-source'

const DEFAULT_JWKS_VAR = 'JOSE_JWKS'
const DEFAULT_ACTIVE_KID_VAR = 'JOSE_ACTIVE_KID'

/**
 * @summary Resolve an environment variable or throw a configuration error when missing.
 * @throws {@link JoseError} with code `CONFIG_ERROR` when the variable is absent or empty.
 */
function envOrThrow(env: NodeJS.ProcessEnv, key: string): string {
  const v = env[key]
  if (!v) throw new JoseError(JoseErrorCode.CONFIG_ERROR, `Missing env ${key}`)
  return v
}

/**
 * @summary Key-set source backed by environment variables.
 * @remarks
 * Reads a JWK set JSON document (`JOSE_JWKS`) and an optional active key id
 * (`JOSE_ACTIVE_KID`) eagerly; {@link reload} re-reads both. The active key id, when set,
 * must name a key of the set.
 */
export class EnvJwkSetSource implements JwkSetSource {
  private readonly env: NodeJS.ProcessEnv
  private readonly jwksVar: string
  private readonly activeKidVar: string
  private set: JWKSet = new JWKSet()
  private activeKeyId?: string

  /**
   * @throws {@link JoseError} with code `CONFIG_ERROR` when the set is missing or invalid.
   */
  constructor(options: EnvJwkSetSourceOptions = {}) {
    this.env = options.env ?? process.env
    this.jwksVar = options.jwksVar ?? DEFAULT_JWKS_VAR
    this.activeKidVar = options.activeKidVar ?? DEFAULT_ACTIVE_KID_VAR
    this.reload()
  }

  /**
   * @summary Re-read the key set and active key id from the environment.
   * @throws {@link JoseError} with code `CONFIG_ERROR`; the previous keys stay in place.
   */
  reload(): void {
    const text = envOrThrow(this.env, this.jwksVar)
    let set: JWKSet
    try {
      set = JWKSet.parseString(text)
    } catch (error) {
      throw new JoseError(
        JoseErrorCode.CONFIG_ERROR,
        `Invalid JWK set in env ${this.jwksVar}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error,
      )
    }
    const activeKeyId = this.env[this.activeKidVar]?.trim() || undefined
    if (activeKeyId !== undefined && !set.getKeyByKeyId(activeKeyId)) {
      throw new JoseError(
        JoseErrorCode.CONFIG_ERROR,
        `${this.activeKidVar} names no key of the set: ${activeKeyId}`,
        { kid: activeKeyId },
      )
    }
    this.set = set
    this.activeKeyId = activeKeyId
  }

  getJwkSet(): JWKSet {
    return this.set
  }

  getActiveKeyId(): string | undefined {
    return this.activeKeyId
  }
}
