export * from './algorithm'
export * from './algorithm-family'
export * from './compression-algorithm'
export * from './encryption-method'
export * from './jose-object-type'
export * from './jwe-algorithm'
export * from './jws-algorithm'
