import { parseHeaderBase64Url } from '../header/header-parser'

import { splitCompact } from './compact'
import { JWEObject } from './jwe-object'
import { JWSObject } from './jws-object'
import { PlainObject } from './plain-object'

/**
 * A JOSE object, discriminated by `kind`.
 */
export type JOSEObject = PlainObject | JWSObject | JWEObject

/**
 * Typed callbacks for {@link parseJOSEObjectWith}.
 */
export interface JOSEObjectHandler<T> {
  onPlainObject(object: PlainObject): T
  onJWSObject(object: JWSObject): T
  onJWEObject(object: JWEObject): T
}

/**
 * @summary Parse a compact serialization of any kind, inferring the kind from the header.
 * @throws {@link JoseError} with code `PARSE_ERROR` on a malformed string or header.
 */
export function parseJOSEObject(serialized: string): JOSEObject {
  const parts = splitCompact(serialized)
  const header = parseHeaderBase64Url(parts[0])
  switch (header.kind) {
    case 'plain':
      return PlainObject.fromParts(parts, header)
    case 'jws':
      return JWSObject.fromParts(parts, header)
    case 'jwe':
      return JWEObject.fromParts(parts, header)
  }
}

/**
 * @summary Parse and hand the object to the matching handler callback.
 */
export function parseJOSEObjectWith<T>(serialized: string, handler: JOSEObjectHandler<T>): T {
  const object = parseJOSEObject(serialized)
  switch (object.kind) {
    case 'plain':
      return handler.onPlainObject(object)
    case 'jws':
      return handler.onJWSObject(object)
    case 'jwe':
      return handler.onJWEObject(object)
  }
}
