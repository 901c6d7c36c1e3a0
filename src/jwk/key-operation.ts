import { parseError } from '../errors/jose.error'

import { KeyUse } from './key-use'

/**
 * @summary Permitted operations of a key (`key_ops`, RFC 7517 §4.3).
 */
export enum KeyOperation {
  SIGN = 'sign',
  VERIFY = 'verify',
  ENCRYPT = 'encrypt',
  DECRYPT = 'decrypt',
  WRAP_KEY = 'wrapKey',
  UNWRAP_KEY = 'unwrapKey',
  DERIVE_KEY = 'deriveKey',
  DERIVE_BITS = 'deriveBits',
}

const OPERATIONS: readonly KeyOperation[] = Object.values(KeyOperation)

const SIGNATURE_OPERATIONS: ReadonlySet<KeyOperation> = new Set([
  KeyOperation.SIGN,
  KeyOperation.VERIFY,
])

function isKeyOperation(value: string): value is KeyOperation {
  return OPERATIONS.some(op => op === value)
}

/**
 * @summary Parse the `key_ops` member. Duplicates collapse, order is kept.
 * @throws {@link JoseError} with code `PARSE_ERROR` naming `key_ops` on an unknown operation.
 */
export function parseKeyOperations(values: readonly string[]): KeyOperation[] {
  const ops: KeyOperation[] = []
  for (const value of values) {
    if (!isKeyOperation(value)) {
      throw parseError(`Unknown key operation: ${value}`, 'key_ops')
    }
    if (!ops.includes(value)) ops.push(value)
  }
  return ops
}

/**
 * @summary Check that `use` and `key_ops` agree when a key declares both.
 * @remarks
 * `sig` admits only sign and verify; `enc` admits every other operation. Custom uses
 * and keys declaring only one of the two members are always consistent.
 */
export function isUseConsistentWithOperations(
  use: KeyUse | undefined,
  ops: readonly KeyOperation[] | undefined,
): boolean {
  if (use === undefined || ops === undefined) return true
  if (use.equals(KeyUse.SIGNATURE)) return ops.every(op => SIGNATURE_OPERATIONS.has(op))
  if (use.equals(KeyUse.ENCRYPTION)) return ops.every(op => !SIGNATURE_OPERATIONS.has(op))
  return true
}
