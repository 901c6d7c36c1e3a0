import { AlgorithmFamily } from '../algorithms/algorithm-family'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseErrorCode } from '../errors/jose.error'
import { JWSHeaderBuilder } from '../header/jws-header'
import { JWKMatcher } from '../jwk/jwk-matcher'
import { catchJoseError } from '../../test/utils/assertions'
import { TestJwkSetBuilder } from '../../test/utils/jwk-set-builders'

import { JwkSetService } from './jwk-set.service'

describe('JwkSetService', () => {
  const source = new TestJwkSetBuilder()
    .withActiveKid('R1')
    .withOctKey('K1', 32, 1)
    .withRsaKey('R1', 'sig', JWSAlgorithm.PS256)
    .withEcKey('E1')
    .build()
  const svc = new JwkSetService(source)

  it('exposes the current set and active key id', () => {
    expect(svc.getJwkSet().size).toBe(3)
    expect(svc.getActiveKeyId()).toBe('R1')
  })

  it('selects keys in set order', () => {
    const asymmetric = svc.select(new JWKMatcher({ families: [AlgorithmFamily.RSA, AlgorithmFamily.EC] }))
    expect(asymmetric.map(key => key.keyId)).toEqual(['R1', 'E1'])

    const matcher = JWKMatcher.forJWSHeader(new JWSHeaderBuilder(JWSAlgorithm.ES256).build())
    expect(matcher && svc.select(matcher).map(key => key.keyId)).toEqual(['E1'])
  })

  it('publishes only public projections', () => {
    const json = svc.getPublicJwkSet()
    const keys = Array.isArray(json.keys) ? json.keys : []

    expect(keys).toHaveLength(2)
    expect(keys).toEqual([
      expect.objectContaining({ kty: 'RSA', kid: 'R1', use: 'sig', alg: 'PS256' }),
      expect.objectContaining({ kty: 'EC', kid: 'E1', crv: 'P-256' }),
    ])
    for (const key of keys) expect(key).not.toHaveProperty('d')
  })

  it('looks keys up by id', () => {
    expect(svc.findByKeyId('E1')?.kty).toBe('EC')
    expect(svc.findByKeyId('missing')).toBeUndefined()
    expect(svc.getByKeyId('K1').kty).toBe('oct')

    const error = catchJoseError(() => svc.getByKeyId('missing'))
    expect(error.code).toBe(JoseErrorCode.KEY_NOT_FOUND)
    expect(error.message).toBe('No key with kid "missing"')
    expect(error.details).toEqual({ kid: 'missing' })
  })

  it('follows rotation in the source', () => {
    const rotating = new TestJwkSetBuilder().withOctKey('A').withOctKey('B', 32, 2).build()
    const rotatingSvc = new JwkSetService(rotating)
    const before = rotatingSvc.getJwkSet()

    rotating.removeKey('A')
    rotating.setActiveKeyId('B')

    expect(before.size).toBe(2)
    expect(rotatingSvc.getJwkSet().keys.map(key => key.keyId)).toEqual(['B'])
    expect(rotatingSvc.getActiveKeyId()).toBe('B')
  })
})
