import { CompressionAlgorithm } from '../algorithms/compression-algorithm'
import { EncryptionMethod } from '../algorithms/encryption-method'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JoseError, JoseErrorCode, asParseError, parseError } from '../errors/jose.error'
import { parseJWK } from '../jwk/jwk'
import { isBase64Url } from '../utils/encoding'
import { getNumber, getObject, getString, requireString } from '../utils/json'

import { COMMON_SE_PARAM_NAMES, CommonSEHeader, CommonSEHeaderBuilder, parseCommonSEParams } from './common-se-header'
import { parseHeaderParams, requireAlgorithmName } from './header'

import type { ECKey } from '../jwk/ec-key'
import type { JsonObject } from '../utils/json'
import type { CommonSEParams } from './common-se-header'
import type { HeaderParams } from './header'

export interface JWEHeaderParams extends HeaderParams, CommonSEParams {
  ephemeralPublicKey?: ECKey
  compression?: CompressionAlgorithm
  agreementPartyUInfo?: string
  agreementPartyVInfo?: string
  pbes2Salt?: string
  pbes2Count?: number
  iv?: string
  authTag?: string
  keyDerivation?: string
}

/** Reserved JWE header parameter names. */
export const JWE_HEADER_PARAM_NAMES: ReadonlySet<string> = new Set([
  ...COMMON_SE_PARAM_NAMES,
  'enc',
  'epk',
  'zip',
  'apu',
  'apv',
  'p2s',
  'p2c',
  'iv',
  'tag',
  'kdf',
])

const BASE64URL_FIELDS = [
  ['apu', 'agreementPartyUInfo'],
  ['apv', 'agreementPartyVInfo'],
  ['p2s', 'pbes2Salt'],
  ['iv', 'iv'],
  ['tag', 'authTag'],
] as const

/**
 * @summary JWE protected header. `enc` is mandatory.
 */
export class JWEHeader extends CommonSEHeader {
  readonly kind = 'jwe' as const
  readonly algorithm: JWEAlgorithm
  readonly encryptionMethod: EncryptionMethod
  readonly ephemeralPublicKey?: ECKey
  readonly compression?: CompressionAlgorithm
  readonly agreementPartyUInfo?: string
  readonly agreementPartyVInfo?: string
  readonly pbes2Salt?: string
  readonly pbes2Count?: number
  readonly iv?: string
  readonly authTag?: string
  readonly keyDerivation?: string

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `epk` is private, `p2c` is not
   * a positive integer, or a binary member is not base64url.
   */
  constructor(
    alg: JWEAlgorithm,
    enc: EncryptionMethod,
    params: JWEHeaderParams = {},
    parsedBase64Url?: string,
  ) {
    super(params, JWE_HEADER_PARAM_NAMES, parsedBase64Url)
    if (params.ephemeralPublicKey?.isPrivate()) {
      throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, 'The "epk" parameter must be a public key', {
        field: 'epk',
      })
    }
    if (params.pbes2Count !== undefined && !(Number.isSafeInteger(params.pbes2Count) && params.pbes2Count > 0)) {
      throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, 'The "p2c" parameter must be a positive integer', {
        field: 'p2c',
      })
    }
    for (const [name, field] of BASE64URL_FIELDS) {
      const value = params[field]
      if (value !== undefined && !isBase64Url(value)) {
        throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The "${name}" parameter must be base64url`, {
          field: name,
        })
      }
    }
    this.algorithm = alg
    this.encryptionMethod = enc
    this.ephemeralPublicKey = params.ephemeralPublicKey
    this.compression = params.compression
    this.agreementPartyUInfo = params.agreementPartyUInfo
    this.agreementPartyVInfo = params.agreementPartyVInfo
    this.pbes2Salt = params.pbes2Salt
    this.pbes2Count = params.pbes2Count
    this.iv = params.iv
    this.authTag = params.authTag
    this.keyDerivation = params.keyDerivation
  }

  /**
   * @summary Parse a JWE header JSON object.
   * @throws {@link JoseError} with code `PARSE_ERROR` naming a missing or mistyped member.
   */
  static parse(json: JsonObject, parsedBase64Url?: string): JWEHeader {
    const alg = JWEAlgorithm.parse(requireAlgorithmName(json))
    const enc = EncryptionMethod.parse(requireString(json, 'enc'))
    const zip = getString(json, 'zip')
    const params: JWEHeaderParams = {
      ...parseHeaderParams(json, JWE_HEADER_PARAM_NAMES),
      ...parseCommonSEParams(json),
      ephemeralPublicKey: parseEphemeralKey(json),
      compression: zip === undefined ? undefined : CompressionAlgorithm.parse(zip),
      agreementPartyUInfo: getString(json, 'apu'),
      agreementPartyVInfo: getString(json, 'apv'),
      pbes2Salt: getString(json, 'p2s'),
      pbes2Count: getNumber(json, 'p2c'),
      iv: getString(json, 'iv'),
      authTag: getString(json, 'tag'),
      keyDerivation: getString(json, 'kdf'),
    }
    return asParseError(() => new JWEHeader(alg, enc, params, parsedBase64Url))
  }

  protected reservedJSON(): JsonObject {
    const json: JsonObject = { enc: this.encryptionMethod.name, ...this.commonSEJSON() }
    if (this.ephemeralPublicKey) json.epk = this.ephemeralPublicKey.toJSON()
    if (this.compression) json.zip = this.compression.name
    if (this.agreementPartyUInfo !== undefined) json.apu = this.agreementPartyUInfo
    if (this.agreementPartyVInfo !== undefined) json.apv = this.agreementPartyVInfo
    if (this.pbes2Salt !== undefined) json.p2s = this.pbes2Salt
    if (this.pbes2Count !== undefined) json.p2c = this.pbes2Count
    if (this.iv !== undefined) json.iv = this.iv
    if (this.authTag !== undefined) json.tag = this.authTag
    if (this.keyDerivation !== undefined) json.kdf = this.keyDerivation
    return json
  }

  /** @internal */
  get jweParams(): JWEHeaderParams {
    return {
      ephemeralPublicKey: this.ephemeralPublicKey,
      compression: this.compression,
      agreementPartyUInfo: this.agreementPartyUInfo,
      agreementPartyVInfo: this.agreementPartyVInfo,
      pbes2Salt: this.pbes2Salt,
      pbes2Count: this.pbes2Count,
      iv: this.iv,
      authTag: this.authTag,
      keyDerivation: this.keyDerivation,
    }
  }
}

function parseEphemeralKey(json: JsonObject): ECKey | undefined {
  const epk = getObject(json, 'epk')
  if (epk === undefined) return undefined
  const key = parseJWK(epk)
  if (key.kty !== 'EC') {
    throw parseError('The "epk" header parameter must be an EC key', 'epk')
  }
  return key
}

export class JWEHeaderBuilder extends CommonSEHeaderBuilder<JWEHeader> {
  private jwe: JWEHeaderParams = {}

  constructor(
    private readonly alg: JWEAlgorithm,
    private readonly enc: EncryptionMethod,
  ) {
    super(JWE_HEADER_PARAM_NAMES)
  }

  static from(header: JWEHeader): JWEHeaderBuilder {
    const builder = new JWEHeaderBuilder(header.algorithm, header.encryptionMethod).copyFromSE(header)
    builder.jwe = header.jweParams
    return builder
  }

  ephemeralPublicKey(epk: ECKey | undefined): this {
    this.jwe.ephemeralPublicKey = epk
    return this
  }

  compression(zip: CompressionAlgorithm | undefined): this {
    this.jwe.compression = zip
    return this
  }

  agreementPartyUInfo(apu: string | undefined): this {
    this.jwe.agreementPartyUInfo = apu
    return this
  }

  agreementPartyVInfo(apv: string | undefined): this {
    this.jwe.agreementPartyVInfo = apv
    return this
  }

  pbes2Salt(p2s: string | undefined): this {
    this.jwe.pbes2Salt = p2s
    return this
  }

  pbes2Count(p2c: number | undefined): this {
    this.jwe.pbes2Count = p2c
    return this
  }

  iv(iv: string | undefined): this {
    this.jwe.iv = iv
    return this
  }

  authTag(tag: string | undefined): this {
    this.jwe.authTag = tag
    return this
  }

  keyDerivation(kdf: string | undefined): this {
    this.jwe.keyDerivation = kdf
    return this
  }

  build(): JWEHeader {
    return new JWEHeader(this.alg, this.enc, { ...this.headerParams(), ...this.se, ...this.jwe })
  }
}
