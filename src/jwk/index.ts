export * from './base-jwk'
export * from './curve'
export * from './ec-key'
export * from './jwk'
export * from './jwk-matcher'
export * from './jwk-selector'
export * from './jwk-set'
export * from './key-operation'
export * from './key-use'
export * from './octet-sequence-key'
export * from './rsa-key'
