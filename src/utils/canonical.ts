import { JoseError, JoseErrorCode } from '../errors/jose.error'

import type { JsonValue } from './json'

/**
 * @summary Serialize a JSON value with lexicographically ordered object members and no
 * whitespace, as required for JWK thumbprints (RFC 7638 §3).
 * @throws {@link JoseError} with code `INVALID_ARGUMENT` when a circular reference is found.
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortMembers(value, new WeakSet<object>()))
}

function sortMembers(value: JsonValue, seen: WeakSet<object>): JsonValue {
  if (value === null || typeof value !== 'object') return value
  if (seen.has(value)) {
    throw new JoseError(
      JoseErrorCode.INVALID_ARGUMENT,
      'Circular reference detected in canonicalJson',
    )
  }
  seen.add(value)
  let result: JsonValue
  if (Array.isArray(value)) {
    result = value.map(item => sortMembers(item, seen))
  } else {
    const sorted: Record<string, JsonValue> = {}
    for (const name of Object.keys(value).sort()) {
      sorted[name] = sortMembers(value[name], seen)
    }
    result = sorted
  }
  // only ancestors count as cycles; shared siblings are fine
  seen.delete(value)
  return result
}
