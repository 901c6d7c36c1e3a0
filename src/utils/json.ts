import { parseError } from '../errors/jose.error'

import type { JoseError } from '../errors/jose.error'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export interface JsonObject {
  [name: string]: JsonValue
}

/**
 * @summary Type guard for a JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * @summary Parse text into a JSON object.
 * @param text JSON text.
 * @param what Name of the parsed structure for error messages.
 * @throws {@link JoseError} with code `PARSE_ERROR` on invalid JSON or a non-object root.
 */
export function parseJsonObject(text: string, what = 'JSON object'): JsonObject {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw parseError(
      `Invalid ${what}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
  if (!isJsonObject(value)) {
    throw parseError(`Invalid ${what}: JSON text is not an object`)
  }
  return value
}

/**
 * @summary True when the object has an own member of the given name, `null` included.
 */
export function hasMember(json: JsonObject, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(json, name)
}

/**
 * @summary Define an own enumerable member; `__proto__` becomes a plain member too.
 */
export function setMember(json: JsonObject, name: string, value: JsonValue): void {
  Object.defineProperty(json, name, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * @summary Deep copy of a JSON object, with every nested object and array frozen when
 * `freeze` is set.
 */
export function copyJsonObject(json: JsonObject, freeze = false): JsonObject {
  const copy: JsonObject = {}
  for (const [name, value] of Object.entries(json)) setMember(copy, name, copyJsonValue(value, freeze))
  if (freeze) Object.freeze(copy)
  return copy
}

export function copyJsonValue(value: JsonValue, freeze = false): JsonValue {
  if (Array.isArray(value)) {
    const copy = value.map(item => copyJsonValue(item, freeze))
    if (freeze) Object.freeze(copy)
    return copy
  }
  return isJsonObject(value) ? copyJsonObject(value, freeze) : value
}

function mistyped(name: string, expected: string): JoseError {
  return parseError(`Unexpected type of JSON object member "${name}": expected ${expected}`, name)
}

/**
 * @summary Read an optional string member; an absent member reads as undefined.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the member when it is not a
 * string, `null` included.
 */
export function getString(json: JsonObject, name: string): string | undefined {
  if (!hasMember(json, name)) return undefined
  const value = json[name]
  if (typeof value !== 'string') throw mistyped(name, 'string')
  return value
}

/**
 * @summary Read a mandatory string member.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the member when missing or mistyped.
 */
export function requireString(json: JsonObject, name: string): string {
  const value = getString(json, name)
  if (value === undefined) {
    throw parseError(`Missing JSON object member "${name}"`, name)
  }
  return value
}

export function getNumber(json: JsonObject, name: string): number | undefined {
  if (!hasMember(json, name)) return undefined
  const value = json[name]
  if (typeof value !== 'number') throw mistyped(name, 'number')
  return value
}

export function getBoolean(json: JsonObject, name: string): boolean | undefined {
  if (!hasMember(json, name)) return undefined
  const value = json[name]
  if (typeof value !== 'boolean') throw mistyped(name, 'boolean')
  return value
}

export function getObject(json: JsonObject, name: string): JsonObject | undefined {
  if (!hasMember(json, name)) return undefined
  const value = json[name]
  if (!isJsonObject(value)) throw mistyped(name, 'object')
  return value
}

export function getArray(json: JsonObject, name: string): JsonValue[] | undefined {
  if (!hasMember(json, name)) return undefined
  const value = json[name]
  if (!Array.isArray(value)) throw mistyped(name, 'array')
  return value
}

/**
 * @summary Read an optional array of strings, e.g. `x5c` or `crit`.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the member when any entry is
 * not a string.
 */
export function getStringArray(json: JsonObject, name: string): string[] | undefined {
  const values = getArray(json, name)
  if (values === undefined) return undefined
  const out: string[] = []
  for (const item of values) {
    if (typeof item !== 'string') throw mistyped(name, 'array of strings')
    out.push(item)
  }
  return out
}

/**
 * @summary Read an optional absolute URL member (`jku`, `x5u`).
 * @throws {@link JoseError} with code `PARSE_ERROR` naming the member when the string is not
 * an absolute URL.
 */
export function getUrl(json: JsonObject, name: string): string | undefined {
  const value = getString(json, name)
  if (value === undefined) return undefined
  try {
    new URL(value)
  } catch {
    throw parseError(`Invalid URL in JSON object member "${name}"`, name)
  }
  return value
}
