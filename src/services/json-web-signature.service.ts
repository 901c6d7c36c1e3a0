import { Inject, Injectable, Optional } from '@nestjs/common'

import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { createJWSSigner, createJWSVerifier } from '../crypto/factories'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWSHeaderBuilder, JWS_HEADER_PARAM_NAMES } from '../header/jws-header'
import { ensureJWSHeaderAccepted } from '../jose/header-filter'
import { JWSObject } from '../jose/jws-object'
import { JWKMatcher } from '../jwk/jwk-matcher'
import { JWKSelector } from '../jwk/jwk-selector'
import { KeyUse } from '../jwk/key-use'
import { JOSE_OPTIONS, JWK_SET_SOURCE } from '../module/jose.tokens'
import { Payload } from '../payload/payload'
import { assertMaxLength } from '../utils/validation'

import type { ResolvedJoseOptions } from '../config/jose.options'
import type { JWSHeader } from '../header/jws-header'
import type { JWSHeaderFilter } from '../jose/header-filter'
import type { JWK } from '../jwk/jwk'
import type { JwkSetSource } from '../keystore/jwk-set-source'
import type { JwsSignOptions, JwsVerifyOptions, JwsVerifyResult, PayloadInput } from '../types/jose'
import type { Logger } from '@nestjs/common'

/** The algorithm a key signs with when neither the caller nor the key names one. */
function defaultAlgorithmFor(key: JWK): JWSAlgorithm | undefined {
  switch (key.kty) {
    case 'oct':
      return JWSAlgorithm.HS256
    case 'RSA':
      return JWSAlgorithm.RS256
    case 'EC':
      return key.curve.jwsAlgorithm
  }
}

function canSign(key: JWK): boolean {
  return key.isPrivate() && (key.use === undefined || key.use.equals(KeyUse.SIGNATURE))
}

/**
 * @summary Filter admitting the accepted algorithms, the reserved JWS parameters and any
 * custom parameter that is not marked critical.
 */
function verificationFilter(header: JWSHeader, acceptedAlgorithms: readonly JWSAlgorithm[]): JWSHeaderFilter {
  const critical = new Set(header.criticalParams ?? [])
  const custom = Object.keys(header.customParams).filter(name => !critical.has(name))
  return { acceptedAlgorithms, acceptedParams: new Set([...JWS_HEADER_PARAM_NAMES, ...custom]) }
}

/**
 * @summary Compact JWS signing and verification with keys from the configured JWK set.
 * @remarks
 * Signing picks the key by explicit `kid`, then the active key id, then the first private
 * signature key that fits the algorithm. Verification derives a {@link JWKMatcher} from the
 * header and tries each candidate key in set order. An invalid signature is a
 * `valid: false` result, never an error.
 */
@Injectable()
export class JsonWebSignatureService {
  constructor(
    @Inject(JWK_SET_SOURCE) private readonly source: JwkSetSource,
    @Inject(JOSE_OPTIONS) private readonly options: ResolvedJoseOptions,
    @Optional() private readonly logger?: Logger,
  ) {}

  async sign(payload: PayloadInput, options?: JwsSignOptions): Promise<string> {
    /**
     * @summary Sign a payload as a compact JWS.
     * @param payload Bytes, string, or JSON object.
     * @param options Algorithm, kid, typ/cty and extra header parameters; `detached` to
     * omit the payload, `unencodedPayload` for RFC 7797.
     * @returns Compact JWS string.
     * @throws {@link JoseError} with code `KEY_NOT_FOUND` when no private key can sign,
     * `ALG_NOT_ACCEPTED` when the algorithm is not among the accepted ones, or
     * `INVALID_KEY_MATERIAL` when the key doesn't fit the algorithm.
     * @example
     * ```ts
     * const jws = await jwsSvc.sign({ hello: 'world' }, { alg: JWSAlgorithm.ES256 })
     * ```
     */
    const key = this.resolveSigningKey(options?.kid, options?.alg)
    const alg = options?.alg ?? this.keyAlgorithm(key) ?? defaultAlgorithmFor(key)
    if (!alg) {
      throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `No JWS algorithm for key "${key.keyId ?? key.kty}"`)
    }
    this.assertAccepted(alg)

    const builder = new JWSHeaderBuilder(alg)
      .keyId(key.keyId)
      .type(options?.typ)
      .contentType(options?.contentType)
      .customParams(options?.customParams ?? {})
    if (options?.unencodedPayload) {
      builder.base64UrlEncodePayload(false).criticalParams(['b64'])
    }
    const object = new JWSObject(builder.build(), Payload.from(payload))
    object.sign(createJWSSigner(key))
    return object.serialize({ detachedPayload: options?.detached })
  }

  async verify(compact: string, options?: JwsVerifyOptions): Promise<JwsVerifyResult> {
    /**
     * @summary Verify a compact JWS against the candidate keys of the set.
     * @param compact Compact JWS string; the payload segment is empty for a detached JWS.
     * @param options Accepted algorithms for this call and the detached payload.
     * @returns `valid`, the parsed object, and the key that validated it.
     * @throws {@link JoseError} with code `SIZE_LIMIT_EXCEEDED`, `PARSE_ERROR`,
     * `ALG_NOT_ACCEPTED`, `PARAMS_NOT_ACCEPTED`, or `KEY_NOT_FOUND` when no key matches
     * the header.
     */
    assertMaxLength('Compact JWS', compact, this.options.maxCompactLength)
    const object =
      options?.detachedPayload === undefined
        ? JWSObject.parse(compact)
        : JWSObject.parseDetached(compact, Payload.from(options.detachedPayload))
    const header = object.header
    const filter = verificationFilter(header, options?.acceptedAlgorithms ?? this.options.acceptedJwsAlgorithms)
    ensureJWSHeaderAccepted(filter, header)

    const matcher = JWKMatcher.forJWSHeader(header)
    if (!matcher) {
      throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported JWS algorithm: ${header.algorithm.name}`)
    }
    const candidates = new JWKSelector(matcher).select(this.source.getJwkSet())
    if (candidates.length === 0) {
      this.logger?.warn('No key matches the JWS header', { alg: header.algorithm.name, kid: header.keyId })
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, 'No key matches the JWS header', {
        alg: header.algorithm.name,
        kid: header.keyId,
      })
    }
    for (const key of candidates) {
      if (object.validate(createJWSVerifier(key, filter))) {
        return { valid: true, object, key }
      }
    }
    this.logger?.warn('JWS signature not validated by any candidate key', {
      alg: header.algorithm.name,
      kid: header.keyId,
      candidates: candidates.length,
    })
    return { valid: false, object }
  }

  private resolveSigningKey(kid: string | undefined, alg: JWSAlgorithm | undefined): JWK {
    const set = this.source.getJwkSet()
    const requested = kid ?? this.source.getActiveKeyId()
    if (requested !== undefined) {
      const key = set.getKeyByKeyId(requested)
      if (!key || !canSign(key)) {
        throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, `No private signing key with kid "${requested}"`, {
          kid: requested,
        })
      }
      return key
    }
    const matcher = alg ? JWKMatcher.forJWSHeader(new JWSHeaderBuilder(alg).build()) : undefined
    const key = set.keys.find(candidate => canSign(candidate) && (matcher?.matches(candidate) ?? true))
    if (!key) {
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, 'No private signing key in the JWK set', {
        alg: alg?.name,
      })
    }
    return key
  }

  /** The key's own `alg`, when it is an accepted JWS algorithm. */
  private keyAlgorithm(key: JWK): JWSAlgorithm | undefined {
    const named = key.algorithm
    if (!named) return undefined
    return this.options.acceptedJwsAlgorithms.find(alg => alg.equals(named))
  }

  private assertAccepted(alg: JWSAlgorithm): void {
    if (!this.options.acceptedJwsAlgorithms.some(accepted => accepted.equals(alg))) {
      throw new JoseError(JoseErrorCode.ALG_NOT_ACCEPTED, `The "${alg.name}" algorithm is not accepted`)
    }
  }
}
