import { Algorithm } from '../algorithms/algorithm'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseError, JoseErrorCode, asParseError } from '../errors/jose.error'
import { getBoolean } from '../utils/json'

import { COMMON_SE_PARAM_NAMES, CommonSEHeader, CommonSEHeaderBuilder, parseCommonSEParams } from './common-se-header'
import { parseHeaderParams, requireAlgorithmName } from './header'

import type { JsonObject } from '../utils/json'
import type { CommonSEParams } from './common-se-header'
import type { HeaderParams } from './header'

export interface JWSHeaderParams extends HeaderParams, CommonSEParams {
  /** RFC 7797 `b64`; false means the payload is not base64url-encoded. */
  base64UrlEncodePayload?: boolean
}

/** Reserved JWS header parameter names. */
export const JWS_HEADER_PARAM_NAMES: ReadonlySet<string> = new Set([...COMMON_SE_PARAM_NAMES, 'b64'])

/**
 * @summary JWS protected header.
 */
export class JWSHeader extends CommonSEHeader {
  readonly kind = 'jws' as const
  readonly algorithm: JWSAlgorithm
  readonly base64UrlEncodePayload: boolean

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `alg` is `none`.
   */
  constructor(alg: JWSAlgorithm, params: JWSHeaderParams = {}, parsedBase64Url?: string) {
    if (alg.equals(Algorithm.NONE)) {
      throw new JoseError(
        JoseErrorCode.INVALID_ARGUMENT,
        'The JWS algorithm "alg" cannot be "none"',
        { field: 'alg' },
      )
    }
    super(params, JWS_HEADER_PARAM_NAMES, parsedBase64Url)
    this.algorithm = alg
    this.base64UrlEncodePayload = params.base64UrlEncodePayload ?? true
  }

  /**
   * @summary Parse a JWS header JSON object.
   * @param parsedBase64Url The segment the JSON was decoded from, kept for signing input.
   * @throws {@link JoseError} with code `PARSE_ERROR` naming a missing or mistyped member.
   */
  static parse(json: JsonObject, parsedBase64Url?: string): JWSHeader {
    const alg = JWSAlgorithm.parse(requireAlgorithmName(json))
    const params: JWSHeaderParams = {
      ...parseHeaderParams(json, JWS_HEADER_PARAM_NAMES),
      ...parseCommonSEParams(json),
      base64UrlEncodePayload: getBoolean(json, 'b64'),
    }
    return asParseError(() => new JWSHeader(alg, params, parsedBase64Url))
  }

  protected reservedJSON(): JsonObject {
    const json = this.commonSEJSON()
    if (!this.base64UrlEncodePayload) json.b64 = false
    return json
  }
}

export class JWSHeaderBuilder extends CommonSEHeaderBuilder<JWSHeader> {
  private b64?: boolean

  constructor(private readonly alg: JWSAlgorithm) {
    super(JWS_HEADER_PARAM_NAMES)
  }

  /** Start from an existing header; the copy has no parsed segment. */
  static from(header: JWSHeader): JWSHeaderBuilder {
    return new JWSHeaderBuilder(header.algorithm)
      .copyFromSE(header)
      .base64UrlEncodePayload(header.base64UrlEncodePayload)
  }

  base64UrlEncodePayload(b64: boolean | undefined): this {
    this.b64 = b64
    return this
  }

  build(): JWSHeader {
    return new JWSHeader(this.alg, {
      ...this.headerParams(),
      ...this.se,
      base64UrlEncodePayload: this.b64,
    })
  }
}
