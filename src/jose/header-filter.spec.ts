import { EncryptionMethod } from '../algorithms/encryption-method'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseErrorCode } from '../errors/jose.error'
import { JWSHeaderBuilder } from '../header/jws-header'

import { DefaultJWEHeaderFilter, DefaultJWSHeaderFilter, ensureJWSHeaderAccepted } from './header-filter'

describe('DefaultJWSHeaderFilter', () => {
  it('accepts every supported algorithm and reserved parameter by default', () => {
    const filter = new DefaultJWSHeaderFilter([JWSAlgorithm.HS256])

    expect(filter.acceptedAlgorithms).toEqual([JWSAlgorithm.HS256])
    expect(filter.acceptedParams.has('kid')).toBe(true)
    expect(filter.acceptedParams.has('b64')).toBe(true)
  })

  it('requires alg among the accepted parameters', () => {
    expect(() => new DefaultJWSHeaderFilter([JWSAlgorithm.HS256], new Set(['kid']))).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.INVALID_ARGUMENT,
        message: 'The accepted header parameters must include at least "alg"',
      }),
    )
  })

  it('requires the accepted algorithms to be supported', () => {
    expect(() => new DefaultJWSHeaderFilter([JWSAlgorithm.HS256], undefined, [JWSAlgorithm.RS256])).toThrow(
      'One or more of the accepted JWS algorithms are not supported',
    )
  })

  it('names the rejected parameters', () => {
    const filter = new DefaultJWSHeaderFilter([JWSAlgorithm.HS256], new Set(['alg', 'kid']))
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).keyId('k').customParam('tenant', 'a').customParam('x', 1).build()

    expect(() => ensureJWSHeaderAccepted(filter, header)).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARAMS_NOT_ACCEPTED, details: { params: ['tenant', 'x'] } }),
    )
  })

  it('does nothing without a filter', () => {
    expect(() => ensureJWSHeaderAccepted(undefined, new JWSHeaderBuilder(JWSAlgorithm.HS512).build())).not.toThrow()
  })
})

describe('DefaultJWEHeaderFilter', () => {
  it('requires the accepted encryption methods to be supported', () => {
    expect(
      () =>
        new DefaultJWEHeaderFilter([JWEAlgorithm.DIR], [EncryptionMethod.A128GCM], undefined, undefined, [
          EncryptionMethod.A256GCM,
        ]),
    ).toThrow('One or more of the accepted encryption methods are not supported')
  })
})
