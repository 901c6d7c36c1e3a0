import { JOSEObjectType } from '../algorithms/jose-object-type'
import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { base64UrlEncodeString } from '../utils/encoding'
import { copyJsonObject, copyJsonValue, getString, getStringArray, hasMember, setMember } from '../utils/json'

import type { Algorithm } from '../algorithms/algorithm'
import type { JsonObject, JsonValue } from '../utils/json'

export type HeaderKind = 'plain' | 'jws' | 'jwe'

/**
 * Parameters every JOSE header can carry besides `alg`.
 */
export interface HeaderParams {
  type?: JOSEObjectType
  contentType?: string
  criticalParams?: readonly string[]
  customParams?: Readonly<Record<string, JsonValue>>
}

/** Names reserved in every header kind. */
export const HEADER_PARAM_NAMES: readonly string[] = Object.freeze(['alg', 'typ', 'cty', 'crit'])

/**
 * @summary Immutable base of the plain, JWS and JWE headers.
 * @remarks
 * Reserved parameters live in typed fields; anything else is kept verbatim in
 * `customParams`. A header parsed from the wire remembers its exact base64url segment.
 */
export abstract class BaseHeader {
  abstract readonly kind: HeaderKind
  abstract readonly algorithm: Algorithm

  readonly type?: JOSEObjectType
  readonly contentType?: string
  readonly criticalParams?: readonly string[]
  readonly customParams: Readonly<Record<string, JsonValue>>
  readonly parsedBase64Url?: string
  private encoded?: string

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when `crit` is empty or a custom
   * parameter uses a reserved name.
   */
  protected constructor(params: HeaderParams, reservedNames: ReadonlySet<string>, parsedBase64Url?: string) {
    if (params.criticalParams !== undefined) {
      if (params.criticalParams.length === 0 || params.criticalParams.some(name => !name)) {
        throw new JoseError(
          JoseErrorCode.INVALID_ARGUMENT,
          'The critical parameters "crit" must be a non-empty list of names',
          { field: 'crit' },
        )
      }
    }
    const custom = params.customParams ?? {}
    for (const name of Object.keys(custom)) {
      assertNotReserved(name, reservedNames)
    }
    this.type = params.type
    this.contentType = params.contentType
    this.criticalParams = params.criticalParams && Object.freeze([...params.criticalParams])
    this.customParams = copyJsonObject(custom, true)
    this.parsedBase64Url = parsedBase64Url
  }

  /** The reserved members this header sets, in serialization order after `alg`. */
  protected abstract reservedJSON(): JsonObject

  getCustomParam(name: string): JsonValue | undefined {
    return hasMember(this.customParams, name) ? this.customParams[name] : undefined
  }

  /** Names of every parameter this header serializes, reserved and custom. */
  get includedParams(): string[] {
    return Object.keys(this.toJSON())
  }

  /**
   * @summary JSON form: `alg` first, then the reserved members, then custom parameters.
   * Reserved members win over same-named custom entries.
   */
  toJSON(): JsonObject {
    const json: JsonObject = { alg: this.algorithm.name }
    if (this.type) json.typ = this.type.type
    if (this.contentType !== undefined) json.cty = this.contentType
    if (this.criticalParams) json.crit = [...this.criticalParams]
    Object.assign(json, this.reservedJSON())
    for (const [name, value] of Object.entries(this.customParams)) {
      if (!hasMember(json, name)) setMember(json, name, copyJsonValue(value))
    }
    return json
  }

  toString(): string {
    return JSON.stringify(this.toJSON())
  }

  /**
   * @summary The base64url segment the header was parsed from, or the encoding of its
   * JSON form for headers built in memory. Computed once.
   */
  toBase64Url(): string {
    if (this.encoded === undefined) this.encoded = this.parsedBase64Url ?? base64UrlEncodeString(this.toString())
    return this.encoded
  }
}

function assertNotReserved(name: string, reservedNames: ReadonlySet<string>): void {
  if (reservedNames.has(name)) {
    throw new JoseError(
      JoseErrorCode.INVALID_ARGUMENT,
      `The parameter name "${name}" matches a reserved name`,
      { field: name },
    )
  }
}

/**
 * @summary Fluent collector of header parameters; `build()` validates once.
 */
export abstract class HeaderBuilder<T extends BaseHeader> {
  protected common: HeaderParams = {}
  protected custom: Record<string, JsonValue> = {}

  protected constructor(protected readonly reservedNames: ReadonlySet<string>) {}

  type(type: JOSEObjectType | undefined): this {
    this.common.type = type
    return this
  }

  contentType(cty: string | undefined): this {
    this.common.contentType = cty
    return this
  }

  criticalParams(names: Iterable<string> | undefined): this {
    this.common.criticalParams = names === undefined ? undefined : [...names]
    return this
  }

  /**
   * @summary Set a custom parameter.
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` for a reserved name.
   */
  customParam(name: string, value: JsonValue): this {
    assertNotReserved(name, this.reservedNames)
    setMember(this.custom, name, value)
    return this
  }

  /** Replace all custom parameters. */
  customParams(params: Readonly<Record<string, JsonValue>>): this {
    this.custom = {}
    for (const [name, value] of Object.entries(params)) this.customParam(name, value)
    return this
  }

  protected headerParams(): HeaderParams {
    return { ...this.common, customParams: { ...this.custom } }
  }

  protected copyFrom(header: BaseHeader): this {
    this.common = {
      type: header.type,
      contentType: header.contentType,
      criticalParams: header.criticalParams,
    }
    return this.customParams(header.customParams)
  }

  abstract build(): T
}

/**
 * @summary Read `typ`, `cty`, `crit` and collect the members outside `reservedNames`
 * as custom parameters.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming a mistyped member.
 */
export function parseHeaderParams(json: JsonObject, reservedNames: ReadonlySet<string>): HeaderParams {
  const typ = getString(json, 'typ')
  const customParams: Record<string, JsonValue> = {}
  for (const [name, value] of Object.entries(json)) {
    if (!reservedNames.has(name)) setMember(customParams, name, value)
  }
  return {
    type: typ === undefined ? undefined : JOSEObjectType.parse(typ),
    contentType: getString(json, 'cty'),
    criticalParams: getStringArray(json, 'crit'),
    customParams,
  }
}

/**
 * @summary Fail with a parse error naming `alg` when the member is missing or not a string.
 */
export function requireAlgorithmName(json: JsonObject): string {
  const alg = json.alg
  if (typeof alg !== 'string') {
    throw parseError('Missing or invalid "alg" header parameter', 'alg')
  }
  return alg
}
