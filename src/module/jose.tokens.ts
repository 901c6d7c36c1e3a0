export const JWK_SET_SOURCE = Symbol('JWK_SET_SOURCE')
export const JOSE_OPTIONS = Symbol('JOSE_OPTIONS')
