/**
 * @summary Error codes for JOSE parsing, state, algorithm and key handling.
 * @remarks
 * `PARSE_ERROR`, `INVALID_ARGUMENT` and `INVALID_STATE` report malformed input,
 * caller misuse and illegal lifecycle transitions. The algorithm codes report a
 * collaborator that cannot or will not process the header. An invalid signature is
 * never an error: verification returns `false` instead.
 */
export enum JoseErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_STATE = 'INVALID_STATE',
  UNSUPPORTED_ALG = 'UNSUPPORTED_ALG',
  ALG_NOT_ACCEPTED = 'ALG_NOT_ACCEPTED',
  PARAMS_NOT_ACCEPTED = 'PARAMS_NOT_ACCEPTED',
  INVALID_KEY_MATERIAL = 'INVALID_KEY_MATERIAL',
  SIGN_VERIFY_FAILED = 'SIGN_VERIFY_FAILED',
  ENCRYPT_FAILED = 'ENCRYPT_FAILED',
  DECRYPT_FAILED = 'DECRYPT_FAILED',
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',
  CONFIG_ERROR = 'CONFIG_ERROR',
  SIZE_LIMIT_EXCEEDED = 'SIZE_LIMIT_EXCEEDED',
}

/**
 * @summary Custom error carrying a {@link JoseErrorCode} and optional details.
 */
export class JoseError extends Error {
  readonly code: JoseErrorCode
  readonly details?: Record<string, unknown>

  /**
   * @summary Construct a JoseError.
   * @param code Machine-readable error code.
   * @param message Optional human-readable message.
   * @param details Optional structured details for diagnostics, e.g. the offending
   * `field` of a parse failure.
   * @param cause Optional underlying error.
   */
  constructor(
    code: JoseErrorCode,
    message?: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message ?? code, cause === undefined ? undefined : { cause })
    this.name = 'JoseError'
    this.code = code
    this.details = details
  }
}

/**
 * @summary Shorthand for a `PARSE_ERROR` naming the offending member.
 */
export function parseError(message: string, field?: string): JoseError {
  return new JoseError(
    JoseErrorCode.PARSE_ERROR,
    message,
    field === undefined ? undefined : { field },
  )
}

/**
 * @summary Run a constructor on parsed input, reporting its `INVALID_ARGUMENT` failures as
 * `PARSE_ERROR` with the same message and details.
 */
export function asParseError<T>(construct: () => T): T {
  try {
    return construct()
  } catch (error) {
    if (error instanceof JoseError && error.code === JoseErrorCode.INVALID_ARGUMENT) {
      throw new JoseError(JoseErrorCode.PARSE_ERROR, error.message, error.details, error)
    }
    throw error
  }
}
