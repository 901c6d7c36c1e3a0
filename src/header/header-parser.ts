import { Algorithm } from '../algorithms/algorithm'
import { base64UrlDecodeToString } from '../utils/encoding'
import { parseJsonObject } from '../utils/json'

import { requireAlgorithmName } from './header'
import { JWEHeader } from './jwe-header'
import { JWSHeader } from './jws-header'
import { PlainHeader } from './plain-header'

import type { JsonObject } from '../utils/json'

/**
 * A JOSE header, discriminated by `kind`.
 */
export type Header = PlainHeader | JWSHeader | JWEHeader

/**
 * @summary Parse a header JSON object, inferring its kind.
 * @remarks `alg: "none"` makes a plain header; otherwise an `enc` member makes a JWE
 * header; anything else is a JWS header.
 * @param parsedBase64Url The base64url segment the JSON came from, if any.
 * @throws {@link JoseError} with code `PARSE_ERROR` when `alg` is missing or a reserved
 * member is mistyped.
 */
export function parseHeader(json: JsonObject, parsedBase64Url?: string): Header {
  const alg = requireAlgorithmName(json)
  if (alg === Algorithm.NONE.name) return PlainHeader.parse(json, parsedBase64Url)
  if (Object.prototype.hasOwnProperty.call(json, 'enc')) return JWEHeader.parse(json, parsedBase64Url)
  return JWSHeader.parse(json, parsedBase64Url)
}

/**
 * @summary Parse header JSON text.
 */
export function parseHeaderString(text: string, parsedBase64Url?: string): Header {
  return parseHeader(parseJsonObject(text, 'JOSE header'), parsedBase64Url)
}

/**
 * @summary Decode and parse a base64url header segment, remembering the segment.
 */
export function parseHeaderBase64Url(segment: string): Header {
  return parseHeaderString(base64UrlDecodeToString(segment, 'header'), segment)
}
