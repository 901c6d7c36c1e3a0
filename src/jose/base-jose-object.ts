import { JoseError } from '../errors/jose.error'

import type { JoseErrorCode } from '../errors/jose.error'
import type { Header } from '../header/header-parser'
import type { Payload } from '../payload/payload'

export type JOSEObjectKind = 'plain' | 'jws' | 'jwe'

/**
 * @summary Header and payload pair common to the three object kinds.
 */
export abstract class BaseJOSEObject<H extends Header> {
  abstract readonly kind: JOSEObjectKind

  /** Segments this object was parsed from; undefined for objects built in memory. */
  readonly parsedParts?: readonly string[]

  protected constructor(parsedParts?: readonly string[]) {
    this.parsedParts = parsedParts && Object.freeze([...parsedParts])
  }

  abstract get header(): H

  /** Undefined only for a JWE that hasn't been decrypted. */
  abstract get payload(): Payload | undefined

  /** The exact string this object was parsed from. */
  get parsedString(): string | undefined {
    return this.parsedParts?.join('.')
  }

  /**
   * @throws {@link JoseError} with code `INVALID_STATE` when the object is not yet signed or
   * encrypted.
   */
  abstract serialize(): string
}

/**
 * @summary Run a collaborator, wrapping foreign failures in a {@link JoseError}.
 */
export function collaborate<T>(code: JoseErrorCode, run: () => T): T {
  try {
    return run()
  } catch (error) {
    if (error instanceof JoseError) throw error
    throw new JoseError(code, error instanceof Error ? error.message : String(error), undefined, error)
  }
}
