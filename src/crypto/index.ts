export * from './aes-kw'
export * from './content-cipher'
export * from './direct'
export * from './ecdh'
export * from './ecdsa'
export * from './factories'
export * from './key-material'
export * from './mac'
export * from './rsa-oaep'
export * from './rsassa'
