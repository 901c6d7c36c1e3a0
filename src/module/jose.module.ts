import { Global, Logger, Module } from '@nestjs/common'

import { resolveJoseOptions } from '../config/jose.options'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWKSet } from '../jwk/jwk-set'
import { EnvJwkSetSource } from '../keystore/env-jwk-set-source'
import { InMemoryJwkSetSource } from '../keystore/in-memory-jwk-set-source'
import { JsonWebEncryptionService } from '../services/json-web-encryption.service'
import { JsonWebSignatureService } from '../services/json-web-signature.service'
import { JwkSetService } from '../services/jwk-set.service'

import { JOSE_OPTIONS, JWK_SET_SOURCE } from './jose.tokens'

import type { JoseModuleAsyncOptions, JoseModuleOptions, ResolvedJoseOptions } from '../config/jose.options'
import type { JwkSetSource } from '../keystore/jwk-set-source'
import type { DynamicModule, Provider } from '@nestjs/common'

export { JOSE_OPTIONS, JWK_SET_SOURCE } from './jose.tokens'

/**
 * @summary Build the key-set source the options describe.
 * @throws {@link JoseError} with code `CONFIG_ERROR` when the keys can't be loaded.
 */
function createJwkSetSource(options: ResolvedJoseOptions): JwkSetSource {
  const jwks = options.jwks ?? {}
  if (jwks.type === 'inline') {
    if (jwks.inline === undefined) {
      throw new JoseError(JoseErrorCode.CONFIG_ERROR, 'Inline JWK set is required')
    }
    let set: JWKSet
    try {
      set = typeof jwks.inline === 'string' ? JWKSet.parseString(jwks.inline) : JWKSet.parse(jwks.inline)
    } catch (error) {
      throw new JoseError(
        JoseErrorCode.CONFIG_ERROR,
        `Invalid inline JWK set: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error,
      )
    }
    return new InMemoryJwkSetSource(set.keys, jwks.activeKeyId)
  }
  return new EnvJwkSetSource(jwks.env ?? {})
}

const serviceProviders: Provider[] = [
  {
    provide: JwkSetService,
    useFactory: (source: JwkSetSource) => new JwkSetService(source),
    inject: [JWK_SET_SOURCE],
  },
  {
    provide: JsonWebSignatureService,
    useFactory: (source: JwkSetSource, opts: ResolvedJoseOptions) =>
      new JsonWebSignatureService(source, opts, new Logger(JsonWebSignatureService.name)),
    inject: [JWK_SET_SOURCE, JOSE_OPTIONS],
  },
  {
    provide: JsonWebEncryptionService,
    useFactory: (source: JwkSetSource, opts: ResolvedJoseOptions) =>
      new JsonWebEncryptionService(source, opts, new Logger(JsonWebEncryptionService.name)),
    inject: [JWK_SET_SOURCE, JOSE_OPTIONS],
  },
]

@Global()
@Module({})
export class JoseModule {
  /**
   * @summary Register the JOSE module with synchronous options.
   * @param options Key-set source, accepted algorithms and size limit.
   * @returns A dynamic module exporting the key-set source and the JOSE services.
   * @throws {@link JoseError} with code `CONFIG_ERROR` when the key set can't be loaded.
   */
  static register(options: JoseModuleOptions = {}): DynamicModule {
    const resolved = resolveJoseOptions(options)
    const providers: Provider[] = [
      { provide: JOSE_OPTIONS, useValue: resolved },
      { provide: JWK_SET_SOURCE, useFactory: () => createJwkSetSource(resolved) },
      ...serviceProviders,
    ]
    return { module: JoseModule, providers, exports: providers }
  }

  /**
   * @summary Register the JOSE module with async factory options.
   * @param options Async factory providing {@link JoseModuleOptions}.
   * @returns A dynamic module with providers wired to the resolved options.
   */
  static registerAsync(options: JoseModuleAsyncOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: JOSE_OPTIONS,
        useFactory: async (...args: unknown[]) => resolveJoseOptions(await options.useFactory(...args)),
        inject: [...(options.inject ?? [])],
      },
      {
        provide: JWK_SET_SOURCE,
        useFactory: (opts: ResolvedJoseOptions) => createJwkSetSource(opts),
        inject: [JOSE_OPTIONS],
      },
      ...serviceProviders,
    ]
    return {
      module: JoseModule,
      imports: options.imports ?? [],
      providers,
      exports: providers,
    }
  }
}
