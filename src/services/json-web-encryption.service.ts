import { Inject, Injectable, Optional } from '@nestjs/common'

import { CompressionAlgorithm } from '../algorithms/compression-algorithm'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { createJWEDecrypter, createJWEEncrypter } from '../crypto/factories'
import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { JWEHeaderBuilder, JWE_HEADER_PARAM_NAMES } from '../header/jwe-header'
import { ensureJWEHeaderAccepted } from '../jose/header-filter'
import { JWEObject } from '../jose/jwe-object'
import { JWKMatcher } from '../jwk/jwk-matcher'
import { JWKSelector } from '../jwk/jwk-selector'
import { KeyUse } from '../jwk/key-use'
import { JOSE_OPTIONS, JWK_SET_SOURCE } from '../module/jose.tokens'
import { Payload } from '../payload/payload'
import { fromUtf8Bytes } from '../utils/encoding'
import { assertMaxLength } from '../utils/validation'

import type { EncryptionMethod } from '../algorithms/encryption-method'
import type { ResolvedJoseOptions } from '../config/jose.options'
import type { JWEHeader } from '../header/jwe-header'
import type { JWEHeaderFilter } from '../jose/header-filter'
import type { JWK } from '../jwk/jwk'
import type { JwkSetSource } from '../keystore/jwk-set-source'
import type { JweDecryptOptions, JweDecryptResult, JweEncryptOptions, PayloadInput } from '../types/jose'
import type { Logger } from '@nestjs/common'

function defaultAlgorithmFor(key: JWK): JWEAlgorithm {
  switch (key.kty) {
    case 'oct':
      return JWEAlgorithm.DIR
    case 'RSA':
      return JWEAlgorithm.RSA_OAEP_256
    case 'EC':
      return JWEAlgorithm.ECDH_ES
  }
}

function canEncrypt(key: JWK): boolean {
  return key.use === undefined || key.use.equals(KeyUse.ENCRYPTION)
}

function decryptionFilter(
  header: JWEHeader,
  acceptedAlgorithms: readonly JWEAlgorithm[],
  acceptedEncryptionMethods: readonly EncryptionMethod[],
): JWEHeaderFilter {
  const critical = new Set(header.criticalParams ?? [])
  const custom = Object.keys(header.customParams).filter(name => !critical.has(name))
  return {
    acceptedAlgorithms,
    acceptedEncryptionMethods,
    acceptedParams: new Set([...JWE_HEADER_PARAM_NAMES, ...custom]),
  }
}

/**
 * @summary Compact JWE encryption and decryption with keys from the configured JWK set.
 * @remarks
 * Secret keys encrypt with `dir` or AES key wrap, RSA keys with RSA-OAEP(-256) and EC keys
 * with ECDH-ES(+AxxxKW). Decryption tries each matching private key in set order.
 */
@Injectable()
export class JsonWebEncryptionService {
  constructor(
    @Inject(JWK_SET_SOURCE) private readonly source: JwkSetSource,
    @Inject(JOSE_OPTIONS) private readonly options: ResolvedJoseOptions,
    @Optional() private readonly logger?: Logger,
  ) {}

  async encrypt(plaintext: PayloadInput, options?: JweEncryptOptions): Promise<string> {
    /**
     * @summary Encrypt plaintext into a compact JWE.
     * @param plaintext Bytes, UTF-8 string, or JSON object.
     * @param options Key management algorithm, content encryption, kid, and `compress` for DEF.
     * @returns Compact JWE string.
     * @throws {@link JoseError} with code `KEY_NOT_FOUND` when no key can encrypt,
     * `ALG_NOT_ACCEPTED` for an algorithm or method outside the accepted ones, or
     * `UNSUPPORTED_ALG` when the key can't serve the algorithm.
     */
    const enc = options?.enc ?? this.options.defaultEncryptionMethod
    const key = this.resolveEncryptionKey(options?.kid, options?.alg, enc)
    const alg = options?.alg ?? this.keyAlgorithm(key) ?? defaultAlgorithmFor(key)
    this.assertAccepted(alg, enc)

    const header = new JWEHeaderBuilder(alg, enc)
      .keyId(key.keyId)
      .compression(options?.compress ? CompressionAlgorithm.DEF : undefined)
      .contentType(options?.contentType)
      .customParams(options?.customParams ?? {})
      .build()
    const object = new JWEObject(header, Payload.from(plaintext))
    object.encrypt(createJWEEncrypter(key, alg))
    return object.serialize()
  }

  async decrypt(compact: string, options?: JweDecryptOptions): Promise<JweDecryptResult> {
    /**
     * @summary Decrypt a compact JWE with the first matching key that authenticates it.
     * @param compact Compact JWE string.
     * @param options Accepted algorithms and encryption methods for this call.
     * @returns Plaintext bytes, the protected header and the key used.
     * @throws {@link JoseError} with code `SIZE_LIMIT_EXCEEDED`, `PARSE_ERROR`,
     * `ALG_NOT_ACCEPTED`, `PARAMS_NOT_ACCEPTED`, `KEY_NOT_FOUND` when no key matches, or
     * `DECRYPT_FAILED` when no candidate key decrypts it.
     */
    assertMaxLength('Compact JWE', compact, this.options.maxCompactLength)
    const object = JWEObject.parse(compact)
    const header = object.header
    const filter = decryptionFilter(
      header,
      options?.acceptedAlgorithms ?? this.options.acceptedJweAlgorithms,
      options?.acceptedEncryptionMethods ?? this.options.acceptedEncryptionMethods,
    )
    ensureJWEHeaderAccepted(filter, header)

    const matcher = JWKMatcher.forJWEHeader(header)
    if (!matcher) {
      throw new JoseError(JoseErrorCode.UNSUPPORTED_ALG, `Unsupported JWE algorithm: ${header.algorithm.name}`)
    }
    const candidates = new JWKSelector(matcher).select(this.source.getJwkSet()).filter(key => key.isPrivate())
    if (candidates.length === 0) {
      this.logger?.warn('No key matches the JWE header', { alg: header.algorithm.name, kid: header.keyId })
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, 'No key matches the JWE header', {
        alg: header.algorithm.name,
        kid: header.keyId,
      })
    }
    let lastError: JoseError | undefined
    for (const key of candidates) {
      try {
        object.decrypt(createJWEDecrypter(key, header.algorithm, filter))
      } catch (error) {
        if (error instanceof JoseError && error.code === JoseErrorCode.DECRYPT_FAILED) {
          lastError = error
          continue
        }
        throw error
      }
      return { plaintext: object.payload?.toBytes() ?? new Uint8Array(), header, key }
    }
    this.logger?.warn('JWE not decrypted by any candidate key', {
      alg: header.algorithm.name,
      kid: header.keyId,
      candidates: candidates.length,
    })
    throw lastError ?? new JoseError(JoseErrorCode.DECRYPT_FAILED, 'JWE decryption failed')
  }

  /**
   * @summary Convenience wrapper returning the plaintext as a UTF-8 string.
   */
  async decryptToString(compact: string, options?: JweDecryptOptions): Promise<string> {
    const { plaintext } = await this.decrypt(compact, options)
    return fromUtf8Bytes(plaintext)
  }

  private resolveEncryptionKey(kid: string | undefined, alg: JWEAlgorithm | undefined, enc: EncryptionMethod): JWK {
    const set = this.source.getJwkSet()
    const requested = kid ?? this.source.getActiveKeyId()
    if (requested !== undefined) {
      const key = set.getKeyByKeyId(requested)
      if (!key || !canEncrypt(key)) {
        throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, `No encryption key with kid "${requested}"`, {
          kid: requested,
        })
      }
      return key
    }
    const matcher = alg ? JWKMatcher.forJWEHeader(new JWEHeaderBuilder(alg, enc).build()) : undefined
    const key = set.keys.find(candidate => canEncrypt(candidate) && (matcher?.matches(candidate) ?? true))
    if (!key) {
      throw new JoseError(JoseErrorCode.KEY_NOT_FOUND, 'No encryption key in the JWK set', { alg: alg?.name })
    }
    return key
  }

  private keyAlgorithm(key: JWK): JWEAlgorithm | undefined {
    const named = key.algorithm
    if (!named) return undefined
    return this.options.acceptedJweAlgorithms.find(alg => alg.equals(named))
  }

  private assertAccepted(alg: JWEAlgorithm, enc: EncryptionMethod): void {
    if (!this.options.acceptedJweAlgorithms.some(accepted => accepted.equals(alg))) {
      throw new JoseError(JoseErrorCode.ALG_NOT_ACCEPTED, `The "${alg.name}" algorithm is not accepted`)
    }
    if (!this.options.acceptedEncryptionMethods.some(accepted => accepted.equals(enc))) {
      throw new JoseError(JoseErrorCode.ALG_NOT_ACCEPTED, `The "${enc.name}" encryption method is not accepted`)
    }
  }
}
