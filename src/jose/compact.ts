import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { isBase64Url } from '../utils/encoding'

/**
 * @summary Split a compact serialization into its three (plain, JWS) or five (JWE)
 * segments, left to right. Segments may be empty.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the missing or extra delimiter.
 * @example
 * ```ts
 * splitCompact('aaa.bbb.ccc') // ['aaa', 'bbb', 'ccc']
 * ```
 */
export function splitCompact(serialized: string): string[] {
  const parts = serialized.split('.')
  switch (parts.length - 1) {
    case 0:
      throw parseError('Invalid serialized JOSE object: Missing part delimiters')
    case 1:
      throw parseError('Invalid serialized JOSE object: Missing second delimiter')
    case 2:
    case 4:
      return parts
    case 3:
      throw parseError('Invalid serialized JOSE object: Missing fourth delimiter')
    default:
      throw parseError('Invalid serialized JOSE object: Too many part delimiters')
  }
}

/**
 * @summary Fail unless the split produced the segment count of the expected object kind.
 */
export function expectPartCount(parts: readonly string[], count: 3 | 5, what: string): void {
  if (parts.length !== count) {
    throw parseError(`Unexpected number of Base64URL parts for ${what}, must be ${count}`)
  }
}

/**
 * @summary Validate a binary segment such as a signature or IV.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the segment.
 */
export function requireSegment(segment: string, name: string): string {
  if (!isBase64Url(segment) || segment.length % 4 === 1) {
    throw new JoseError(JoseErrorCode.PARSE_ERROR, `Invalid base64url ${name} part`, { field: name })
  }
  return segment
}
