export * from './common-se-header'
export * from './header'
export * from './header-parser'
export * from './jwe-header'
export * from './jws-header'
export * from './plain-header'
