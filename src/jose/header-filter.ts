import { containsAlgorithm } from '../algorithms/algorithm'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWE_HEADER_PARAM_NAMES } from '../header/jwe-header'
import { JWS_HEADER_PARAM_NAMES } from '../header/jws-header'

import type { Algorithm } from '../algorithms/algorithm'
import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import type { JWSAlgorithm } from '../algorithms/jws-algorithm'
import type { JWEHeader } from '../header/jwe-header'
import type { JWSHeader } from '../header/jws-header'

export interface JWSHeaderFilter {
  readonly acceptedAlgorithms: readonly JWSAlgorithm[]
  readonly acceptedParams: ReadonlySet<string>
}

export interface JWEHeaderFilter {
  readonly acceptedAlgorithms: readonly JWEAlgorithm[]
  readonly acceptedEncryptionMethods: readonly EncryptionMethod[]
  readonly acceptedParams: ReadonlySet<string>
}

function checkAcceptedParams(acceptedParams: ReadonlySet<string>): ReadonlySet<string> {
  if (!acceptedParams.has('alg')) {
    throw new JoseError(
      JoseErrorCode.INVALID_ARGUMENT,
      'The accepted header parameters must include at least "alg"',
    )
  }
  return new Set(acceptedParams)
}

function checkSubset<T extends Algorithm>(accepted: readonly T[], supported: readonly T[], what: string): readonly T[] {
  if (!accepted.every(alg => containsAlgorithm(supported, alg))) {
    throw new JoseError(
      JoseErrorCode.INVALID_ARGUMENT,
      `One or more of the accepted ${what} are not supported`,
    )
  }
  return Object.freeze([...accepted])
}

/**
 * @summary Accepts the supported algorithms (or a subset) and, by default, the reserved
 * JWS header parameters.
 * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `alg` is not an accepted
 * parameter or an accepted algorithm is not supported.
 */
export class DefaultJWSHeaderFilter implements JWSHeaderFilter {
  readonly acceptedAlgorithms: readonly JWSAlgorithm[]
  readonly acceptedParams: ReadonlySet<string>

  constructor(
    readonly supportedAlgorithms: readonly JWSAlgorithm[],
    acceptedParams: ReadonlySet<string> = JWS_HEADER_PARAM_NAMES,
    acceptedAlgorithms: readonly JWSAlgorithm[] = supportedAlgorithms,
  ) {
    this.acceptedParams = checkAcceptedParams(acceptedParams)
    this.acceptedAlgorithms = checkSubset(acceptedAlgorithms, supportedAlgorithms, 'JWS algorithms')
  }
}

/**
 * @summary JWE counterpart of {@link DefaultJWSHeaderFilter}, also filtering `enc`.
 */
export class DefaultJWEHeaderFilter implements JWEHeaderFilter {
  readonly acceptedAlgorithms: readonly JWEAlgorithm[]
  readonly acceptedEncryptionMethods: readonly EncryptionMethod[]
  readonly acceptedParams: ReadonlySet<string>

  constructor(
    readonly supportedAlgorithms: readonly JWEAlgorithm[],
    readonly supportedEncryptionMethods: readonly EncryptionMethod[],
    acceptedParams: ReadonlySet<string> = JWE_HEADER_PARAM_NAMES,
    acceptedAlgorithms: readonly JWEAlgorithm[] = supportedAlgorithms,
    acceptedEncryptionMethods: readonly EncryptionMethod[] = supportedEncryptionMethods,
  ) {
    this.acceptedParams = checkAcceptedParams(acceptedParams)
    this.acceptedAlgorithms = checkSubset(acceptedAlgorithms, supportedAlgorithms, 'JWE algorithms')
    this.acceptedEncryptionMethods = checkSubset(
      acceptedEncryptionMethods,
      supportedEncryptionMethods,
      'encryption methods',
    )
  }
}

/**
 * @summary Apply a verifier's filter to a JWS header.
 * @throws {@link JoseError} with code `ALG_NOT_ACCEPTED` or `PARAMS_NOT_ACCEPTED`.
 */
export function ensureJWSHeaderAccepted(filter: JWSHeaderFilter | undefined, header: JWSHeader): void {
  if (!filter) return
  if (!containsAlgorithm(filter.acceptedAlgorithms, header.algorithm)) {
    throw new JoseError(
      JoseErrorCode.ALG_NOT_ACCEPTED,
      `The "${header.algorithm.name}" algorithm is not accepted by the JWS verifier`,
    )
  }
  ensureParamsAccepted(filter.acceptedParams, header.includedParams, 'JWS verifier')
}

/**
 * @summary Apply a decrypter's filter to a JWE header.
 * @throws {@link JoseError} with code `ALG_NOT_ACCEPTED` or `PARAMS_NOT_ACCEPTED`.
 */
export function ensureJWEHeaderAccepted(filter: JWEHeaderFilter | undefined, header: JWEHeader): void {
  if (!filter) return
  if (!containsAlgorithm(filter.acceptedAlgorithms, header.algorithm)) {
    throw new JoseError(
      JoseErrorCode.ALG_NOT_ACCEPTED,
      `The "${header.algorithm.name}" algorithm is not accepted by the JWE decrypter`,
    )
  }
  if (!containsAlgorithm(filter.acceptedEncryptionMethods, header.encryptionMethod)) {
    throw new JoseError(
      JoseErrorCode.ALG_NOT_ACCEPTED,
      `The "${header.encryptionMethod.name}" encryption method is not accepted by the JWE decrypter`,
    )
  }
  ensureParamsAccepted(filter.acceptedParams, header.includedParams, 'JWE decrypter')
}

function ensureParamsAccepted(accepted: ReadonlySet<string>, included: readonly string[], who: string): void {
  const rejected = included.filter(name => !accepted.has(name))
  if (rejected.length > 0) {
    throw new JoseError(
      JoseErrorCode.PARAMS_NOT_ACCEPTED,
      `One or more header parameters not accepted by the ${who}`,
      { params: rejected },
    )
  }
}
