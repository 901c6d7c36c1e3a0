import { JoseError } from '../../src/errors/jose.error'

import type { JoseErrorCode } from '../../src/errors/jose.error'

/**
 * Assert that a promise rejects with a JoseError of the specified code.
 * @param promise The promise to test
 * @param code Expected JoseErrorCode
 * @param messageFragment Optional fragment that should appear in the error message
 */
export async function expectJoseError(
  promise: Promise<unknown>,
  code: JoseErrorCode,
  messageFragment?: string,
): Promise<void> {
  await expect(promise).rejects.toMatchObject({
    name: 'JoseError',
    code,
  })

  if (messageFragment) {
    await expect(promise).rejects.toThrow(messageFragment)
  }
}

/**
 * Run a synchronous operation and return the JoseError it throws.
 * @throws If the operation returns normally or throws something else
 */
export function catchJoseError(run: () => unknown): JoseError {
  try {
    run()
  } catch (error) {
    if (error instanceof JoseError) return error
    throw error
  }
  throw new Error('Expected a JoseError to be thrown')
}

/**
 * Assert that a string is a compact serialization with the given number of segments,
 * each base64url (possibly empty).
 */
export function expectCompact(compact: string, segments: 3 | 5): void {
  const parts = compact.split('.')
  expect(parts).toHaveLength(segments)
  for (const part of parts) expect(part).toMatch(/^[\w-]*$/)
}
