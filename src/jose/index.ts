export * from './base-jose-object'
export * from './collaborators'
export * from './compact'
export * from './header-filter'
export * from './jose-object'
export * from './jwe-object'
export * from './jws-object'
export * from './plain-object'
