import { EncryptionMethod } from '../algorithms/encryption-method'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'

import type { EnvJwkSetSourceOptions } from '../keystore/jwk-set-source'
import type { JsonObject } from '../utils/json'
import type { InjectionToken, ModuleMetadata, OptionalFactoryDependency } from '@nestjs/common'

export interface JoseModuleOptions {
  jwks?: {
    type?: 'env' | 'inline'
    env?: EnvJwkSetSourceOptions
    /** JWK set document, as a JSON object or its text. */
    inline?: JsonObject | string
    /** Active key id for an inline set. */
    activeKeyId?: string
  }
  acceptedJwsAlgorithms?: readonly JWSAlgorithm[]
  acceptedJweAlgorithms?: readonly JWEAlgorithm[]
  acceptedEncryptionMethods?: readonly EncryptionMethod[]
  /** Content encryption when the caller names none (default: A256GCM) */
  defaultEncryptionMethod?: EncryptionMethod
  /** Maximum compact serialization length in characters for parsing (default: 1MB) */
  maxCompactLength?: number
}

export type JoseModuleAsyncOptions = Pick<ModuleMetadata, 'imports'> & {
  useFactory: (...args: unknown[]) => Promise<JoseModuleOptions> | JoseModuleOptions
  inject?: ReadonlyArray<InjectionToken | OptionalFactoryDependency>
}

export type ResolvedJoseOptions = Required<Omit<JoseModuleOptions, 'jwks'>> & Pick<JoseModuleOptions, 'jwks'>

export const defaultJoseOptions: ResolvedJoseOptions = {
  jwks: { type: 'env', env: {} },
  acceptedJwsAlgorithms: [
    ...JWSAlgorithm.Family.HMAC_SHA,
    ...JWSAlgorithm.Family.RSA,
    ...JWSAlgorithm.Family.EC,
  ],
  acceptedJweAlgorithms: [
    JWEAlgorithm.DIR,
    ...JWEAlgorithm.Family.AES_KW,
    JWEAlgorithm.RSA_OAEP,
    JWEAlgorithm.RSA_OAEP_256,
    ...JWEAlgorithm.Family.ECDH_ES,
  ],
  acceptedEncryptionMethods: [...EncryptionMethod.Family.AES_CBC_HMAC_SHA, ...EncryptionMethod.Family.AES_GCM],
  defaultEncryptionMethod: EncryptionMethod.A256GCM,
  maxCompactLength: 1024 * 1024,
}

/**
 * @summary Fill unset options from {@link defaultJoseOptions}.
 */
export function resolveJoseOptions(options: JoseModuleOptions = {}): ResolvedJoseOptions {
  const resolved: ResolvedJoseOptions = { ...defaultJoseOptions }
  for (const [name, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(resolved, { [name]: value })
  }
  return resolved
}
