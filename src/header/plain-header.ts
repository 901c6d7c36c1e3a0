import { Algorithm } from '../algorithms/algorithm'
import { JoseError, JoseErrorCode, asParseError } from '../errors/jose.error'

import { HEADER_PARAM_NAMES, BaseHeader, HeaderBuilder, parseHeaderParams, requireAlgorithmName } from './header'

import type { JsonObject } from '../utils/json'
import type { HeaderParams } from './header'

const PLAIN_HEADER_PARAM_NAMES: ReadonlySet<string> = new Set(HEADER_PARAM_NAMES)

/**
 * @summary Header of an unsecured object; `alg` is always `none`.
 * @remarks Key identification members such as `kid` are ordinary custom parameters here.
 */
export class PlainHeader extends BaseHeader {
  readonly kind = 'plain' as const
  readonly algorithm = Algorithm.NONE

  constructor(params: HeaderParams = {}, parsedBase64Url?: string) {
    super(params, PLAIN_HEADER_PARAM_NAMES, parsedBase64Url)
  }

  /**
   * @throws {@link JoseError} with code `PARSE_ERROR` when `alg` is not `none` or a member
   * is mistyped.
   */
  static parse(json: JsonObject, parsedBase64Url?: string): PlainHeader {
    if (requireAlgorithmName(json) !== Algorithm.NONE.name) {
      throw new JoseError(JoseErrorCode.PARSE_ERROR, 'The algorithm "alg" header parameter must be "none"', {
        field: 'alg',
      })
    }
    const params = parseHeaderParams(json, PLAIN_HEADER_PARAM_NAMES)
    return asParseError(() => new PlainHeader(params, parsedBase64Url))
  }

  protected reservedJSON(): JsonObject {
    return {}
  }
}

export class PlainHeaderBuilder extends HeaderBuilder<PlainHeader> {
  constructor() {
    super(PLAIN_HEADER_PARAM_NAMES)
  }

  static from(header: PlainHeader): PlainHeaderBuilder {
    return new PlainHeaderBuilder().copyFrom(header)
  }

  build(): PlainHeader {
    return new PlainHeader(this.headerParams())
  }
}
