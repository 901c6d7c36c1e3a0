import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { AESDecrypter, AESEncrypter } from './aes-kw'
import { DirectDecrypter, DirectEncrypter } from './direct'
import { ECDHDecrypter, ECDHEncrypter } from './ecdh'
import { ECDSASigner, ECDSAVerifier } from './ecdsa'
import { MACSigner, MACVerifier } from './mac'
import { RSADecrypter, RSAEncrypter } from './rsa-oaep'
import { RSASSASigner, RSASSAVerifier } from './rsassa'

import type { JWEDecrypter, JWEEncrypter, JWSSigner, JWSVerifier } from '../jose/collaborators'
import type { JWEHeaderFilter, JWSHeaderFilter } from '../jose/header-filter'
import type { JWK } from '../jwk/jwk'

/**
 * @summary Signer for a private key or shared secret, chosen by `kty`.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` when the key can't sign.
 */
export function createJWSSigner(jwk: JWK): JWSSigner {
  switch (jwk.kty) {
    case 'oct':
      return new MACSigner(jwk)
    case 'RSA':
      return new RSASSASigner(jwk)
    case 'EC':
      return new ECDSASigner(jwk)
  }
}

export function createJWSVerifier(jwk: JWK, headerFilter?: JWSHeaderFilter): JWSVerifier {
  switch (jwk.kty) {
    case 'oct':
      return new MACVerifier(jwk, headerFilter)
    case 'RSA':
      return new RSASSAVerifier(jwk, headerFilter)
    case 'EC':
      return new ECDSAVerifier(jwk, headerFilter)
  }
}

function usesKeyWrap(alg: JWEAlgorithm | undefined): boolean {
  return alg !== undefined && JWEAlgorithm.Family.AES_KW.has(alg)
}

function assertOctAlgorithm(alg: JWEAlgorithm | undefined): void {
  if (alg !== undefined && !alg.equals(JWEAlgorithm.DIR) && !usesKeyWrap(alg)) {
    throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported algorithm for a secret key: ${alg.name}`)
  }
}

/**
 * @summary Encrypter for a recipient key. A secret key encrypts directly unless `alg`
 * names an AES key wrap algorithm.
 * @throws {@link JoseError} with code `UNSUPPORTED_ALG` for an algorithm a secret key can't serve.
 */
export function createJWEEncrypter(jwk: JWK, alg?: JWEAlgorithm): JWEEncrypter {
  switch (jwk.kty) {
    case 'oct':
      assertOctAlgorithm(alg)
      return usesKeyWrap(alg) ? new AESEncrypter(jwk) : new DirectEncrypter(jwk)
    case 'RSA':
      return new RSAEncrypter(jwk)
    case 'EC':
      return new ECDHEncrypter(jwk)
  }
}

export function createJWEDecrypter(jwk: JWK, alg?: JWEAlgorithm, headerFilter?: JWEHeaderFilter): JWEDecrypter {
  switch (jwk.kty) {
    case 'oct':
      assertOctAlgorithm(alg)
      return usesKeyWrap(alg) ? new AESDecrypter(jwk, headerFilter) : new DirectDecrypter(jwk, headerFilter)
    case 'RSA':
      return new RSADecrypter(jwk, headerFilter)
    case 'EC':
      return new ECDHDecrypter(jwk, headerFilter)
  }
}
