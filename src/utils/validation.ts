import { JoseError, JoseErrorCode } from '../errors/jose.error'

/**
 * @summary Assert that a required constructor or builder argument is a non-empty string.
 * @throws {@link JoseError} with code `INVALID_ARGUMENT` when empty or missing.
 */
export function assertNonEmpty(name: string, value: string | undefined): asserts value is string {
  if (!value) {
    throw new JoseError(JoseErrorCode.INVALID_ARGUMENT, `The ${name} must not be empty`)
  }
}

/**
 * @summary Assert that key material has the exact length an algorithm requires.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` if the length doesn't match.
 */
export function assertKeyLength(name: string, bytes: Uint8Array, expectedBits: number): void {
  if (bytes.length * 8 !== expectedBits) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `${name} must be ${expectedBits} bits (got ${bytes.length * 8} bits)`,
    )
  }
}

/**
 * @summary Assert that key material meets a minimum length.
 * @throws {@link JoseError} with code `INVALID_KEY_MATERIAL` if too short.
 */
export function assertMinKeyLength(name: string, bytes: Uint8Array, minBits: number): void {
  if (bytes.length * 8 < minBits) {
    throw new JoseError(
      JoseErrorCode.INVALID_KEY_MATERIAL,
      `${name} must be at least ${minBits} bits (got ${bytes.length * 8} bits)`,
    )
  }
}

/**
 * @summary Assert that a serialized input doesn't exceed a maximum size.
 * @throws {@link JoseError} with code `SIZE_LIMIT_EXCEEDED` if too large.
 */
export function assertMaxLength(name: string, value: string, maxLength: number): void {
  if (value.length > maxLength) {
    throw new JoseError(
      JoseErrorCode.SIZE_LIMIT_EXCEEDED,
      `${name} exceeds maximum size of ${maxLength} characters (got ${value.length})`,
    )
  }
}
