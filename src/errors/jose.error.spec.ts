import { JoseError, JoseErrorCode, asParseError, parseError } from './jose.error'

describe('JoseError', () => {
  describe('construction', () => {
    it('constructs with code only', () => {
      const error = new JoseError(JoseErrorCode.INVALID_STATE)

      expect(error).toBeInstanceOf(Error)
      expect(error).toBeInstanceOf(JoseError)
      expect(error.code).toBe(JoseErrorCode.INVALID_STATE)
      expect(error.message).toBe('INVALID_STATE')
      expect(error.details).toBeUndefined()
    })

    it('constructs with code, message, and details', () => {
      const details = { field: 'x5c' }
      const error = new JoseError(
        JoseErrorCode.PARSE_ERROR,
        'Unexpected type of JSON object member "x5c"',
        details,
      )

      expect(error.code).toBe(JoseErrorCode.PARSE_ERROR)
      expect(error.message).toBe('Unexpected type of JSON object member "x5c"')
      expect(error.details).toEqual(details)
    })

    it('has correct name property', () => {
      const error = new JoseError(JoseErrorCode.KEY_NOT_FOUND)
      expect(error.name).toBe('JoseError')
    })

    it('keeps the underlying cause', () => {
      const cause = new Error('boom')
      const error = new JoseError(JoseErrorCode.SIGN_VERIFY_FAILED, 'failed', undefined, cause)
      expect(error.cause).toBe(cause)
    })
  })

  describe('parseError', () => {
    it('names the offending field', () => {
      const error = parseError('Missing JSON object member "alg"', 'alg')
      expect(error.code).toBe(JoseErrorCode.PARSE_ERROR)
      expect(error.details).toEqual({ field: 'alg' })
    })

    it('omits details without a field', () => {
      expect(parseError('Invalid JSON').details).toBeUndefined()
    })
  })

  describe('error propagation', () => {
    it('can be caught as JoseError', () => {
      expect(() => {
        throw new JoseError(JoseErrorCode.INVALID_STATE, 'Test error')
      }).toThrow(expect.objectContaining({ code: JoseErrorCode.INVALID_STATE }))
    })
  })
})

describe('JoseErrorCode enum', () => {
  it('no duplicate values in enum', () => {
    const values = Object.values(JoseErrorCode)
    const uniqueValues = new Set(values)
    expect(values.length).toBe(uniqueValues.size)
  })

  it('enum has correct count of codes', () => {
    expect(Object.keys(JoseErrorCode).length).toBe(13)
  })
})

describe('asParseError', () => {
  it('returns the constructed value', () => {
    expect(asParseError(() => 42)).toBe(42)
  })

  it('reports INVALID_ARGUMENT as PARSE_ERROR with the same message and details', () => {
    const original = new JoseError(JoseErrorCode.INVALID_ARGUMENT, 'bad p2c', { field: 'p2c' })
    let caught: unknown
    try {
      asParseError(() => {
        throw original
      })
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(JoseError)
    expect(caught).toMatchObject({ code: JoseErrorCode.PARSE_ERROR, message: 'bad p2c', details: { field: 'p2c' } })
    expect(caught instanceof JoseError && caught.cause).toBe(original)
  })

  it('passes other errors through unchanged', () => {
    const other = new JoseError(JoseErrorCode.INVALID_KEY_MATERIAL, 'short key')
    expect(() =>
      asParseError(() => {
        throw other
      }),
    ).toThrow(other)
  })
})
