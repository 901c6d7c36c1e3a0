import 'reflect-metadata'

export * from './algorithms'
export * from './config/jose.options'
export * from './crypto'
export * from './errors/jose.error'
export * from './header'
export * from './jose'
export * from './jwk'
export * from './keystore/env-jwk-set-source'
export * from './keystore/in-memory-jwk-set-source'
export * from './keystore/jwk-set-source'
export * from './module/jose.module'
export * from './payload/payload'
export * from './services/json-web-encryption.service'
export * from './services/json-web-signature.service'
export * from './services/jwk-set.service'
export * from './types/jose'
export * from './utils/bytes'
export * from './utils/canonical'
export * from './utils/encoding'
export * from './utils/json'
