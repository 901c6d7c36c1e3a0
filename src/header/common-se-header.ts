import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { parseJWK } from '../jwk/jwk'
import { base64Decode, isBase64Url } from '../utils/encoding'
import { getObject, getString, getStringArray, getUrl } from '../utils/json'

import { BaseHeader, HEADER_PARAM_NAMES, HeaderBuilder } from './header'

import type { JWK } from '../jwk/jwk'
import type { JsonObject } from '../utils/json'
import type { HeaderParams } from './header'

/**
 * Key identification parameters shared by JWS and JWE headers (RFC 7515 §4.1).
 */
export interface CommonSEParams {
  jwkSetUrl?: string
  jwk?: JWK
  x509CertUrl?: string
  x509CertThumbprint?: string
  x509CertSha256Thumbprint?: string
  x509CertChain?: readonly string[]
  keyId?: string
}

export const COMMON_SE_PARAM_NAMES: readonly string[] = Object.freeze([
  ...HEADER_PARAM_NAMES,
  'jku',
  'jwk',
  'x5u',
  'x5t',
  'x5t#S256',
  'x5c',
  'kid',
])

/**
 * @summary Base of the JWS and JWE headers.
 */
export abstract class CommonSEHeader extends BaseHeader {
  readonly jwkSetUrl?: string
  readonly jwk?: JWK
  readonly x509CertUrl?: string
  readonly x509CertThumbprint?: string
  readonly x509CertSha256Thumbprint?: string
  readonly x509CertChain?: readonly string[]
  readonly keyId?: string

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `jwk` holds private material
   * or a thumbprint or certificate is not properly encoded.
   */
  protected constructor(
    params: HeaderParams & CommonSEParams,
    reservedNames: ReadonlySet<string>,
    parsedBase64Url?: string,
  ) {
    super(params, reservedNames, parsedBase64Url)
    if (params.jwk?.isPrivate()) {
      throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, 'The "jwk" parameter must be a public key', {
        field: 'jwk',
      })
    }
    for (const [name, value] of [
      ['x5t', params.x509CertThumbprint],
      ['x5t#S256', params.x509CertSha256Thumbprint],
    ] as const) {
      if (value !== undefined && !isBase64Url(value)) {
        throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The "${name}" parameter must be base64url`, {
          field: name,
        })
      }
    }
    this.jwkSetUrl = params.jwkSetUrl
    this.jwk = params.jwk
    this.x509CertUrl = params.x509CertUrl
    this.x509CertThumbprint = params.x509CertThumbprint
    this.x509CertSha256Thumbprint = params.x509CertSha256Thumbprint
    this.x509CertChain = params.x509CertChain && Object.freeze([...params.x509CertChain])
    this.keyId = params.keyId
  }

  protected commonSEJSON(): JsonObject {
    const json: JsonObject = {}
    if (this.jwkSetUrl !== undefined) json.jku = this.jwkSetUrl
    if (this.jwk) json.jwk = this.jwk.toJSON()
    if (this.x509CertUrl !== undefined) json.x5u = this.x509CertUrl
    if (this.x509CertThumbprint !== undefined) json.x5t = this.x509CertThumbprint
    if (this.x509CertSha256Thumbprint !== undefined) json['x5t#S256'] = this.x509CertSha256Thumbprint
    if (this.x509CertChain) json.x5c = [...this.x509CertChain]
    if (this.keyId !== undefined) json.kid = this.keyId
    return json
  }

  protected get commonSEParams(): CommonSEParams {
    return {
      jwkSetUrl: this.jwkSetUrl,
      jwk: this.jwk,
      x509CertUrl: this.x509CertUrl,
      x509CertThumbprint: this.x509CertThumbprint,
      x509CertSha256Thumbprint: this.x509CertSha256Thumbprint,
      x509CertChain: this.x509CertChain,
      keyId: this.keyId,
    }
  }
}

export abstract class CommonSEHeaderBuilder<T extends CommonSEHeader> extends HeaderBuilder<T> {
  protected se: CommonSEParams = {}

  jwkSetUrl(url: string | undefined): this {
    this.se.jwkSetUrl = url
    return this
  }

  jwk(jwk: JWK | undefined): this {
    this.se.jwk = jwk
    return this
  }

  x509CertUrl(url: string | undefined): this {
    this.se.x509CertUrl = url
    return this
  }

  x509CertThumbprint(thumbprint: string | undefined): this {
    this.se.x509CertThumbprint = thumbprint
    return this
  }

  x509CertSha256Thumbprint(thumbprint: string | undefined): this {
    this.se.x509CertSha256Thumbprint = thumbprint
    return this
  }

  x509CertChain(chain: readonly string[] | undefined): this {
    this.se.x509CertChain = chain
    return this
  }

  keyId(kid: string | undefined): this {
    this.se.keyId = kid
    return this
  }

  protected copyFromSE(header: CommonSEHeader): this {
    this.copyFrom(header)
    this.se = {
      jwkSetUrl: header.jwkSetUrl,
      jwk: header.jwk,
      x509CertUrl: header.x509CertUrl,
      x509CertThumbprint: header.x509CertThumbprint,
      x509CertSha256Thumbprint: header.x509CertSha256Thumbprint,
      x509CertChain: header.x509CertChain,
      keyId: header.keyId,
    }
    return this
  }
}

/**
 * @summary Read the key identification members of a JWS or JWE header.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming a missing or mistyped member.
 */
export function parseCommonSEParams(json: JsonObject): CommonSEParams {
  const jwkJson = getObject(json, 'jwk')
  let jwk: JWK | undefined
  if (jwkJson !== undefined) {
    jwk = parseJWK(jwkJson)
    if (jwk.isPrivate()) {
      throw parseError('Non-public key in "jwk" header parameter', 'jwk')
    }
  }
  const x5c = getStringArray(json, 'x5c')
  x5c?.forEach(entry => base64Decode(entry, 'x5c'))
  return {
    jwkSetUrl: getUrl(json, 'jku'),
    jwk,
    x509CertUrl: getUrl(json, 'x5u'),
    x509CertThumbprint: getString(json, 'x5t'),
    x509CertSha256Thumbprint: getString(json, 'x5t#S256'),
    x509CertChain: x5c,
    keyId: getString(json, 'kid'),
  }
}
