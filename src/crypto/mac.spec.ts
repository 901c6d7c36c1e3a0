import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseErrorCode } from '../errors/jose.error'
import { JWSHeaderBuilder } from '../header/jws-header'
import { toUtf8Bytes } from '../utils/encoding'
import { octKey, testSecret } from '../../test/fixtures/test-keys'

import { MACSigner, MACVerifier } from './mac'

const INPUT = toUtf8Bytes('eyJhbGciOiJIUzI1NiJ9.aGVsbG8')

describe('MACSigner', () => {
  it.each([
    [JWSAlgorithm.HS256, 32, 32],
    [JWSAlgorithm.HS384, 48, 48],
    [JWSAlgorithm.HS512, 64, 64],
  ])('signs %s with a MAC of the hash length', (alg, secretBytes, macBytes) => {
    const header = new JWSHeaderBuilder(alg).build()
    const secret = testSecret(secretBytes, 3)
    const mac = new MACSigner(secret).sign(header, INPUT)

    expect(mac).toHaveLength(macBytes)
    expect(new MACVerifier(secret).verify(header, INPUT, mac)).toBe(true)
  })

  it('accepts an octet sequence key', () => {
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).build()
    const mac = new MACSigner(octKey(32, 1)).sign(header, INPUT)

    expect(new MACVerifier(testSecret(32, 1)).verify(header, INPUT, mac)).toBe(true)
  })

  it('rejects secrets shorter than 256 bits', () => {
    expect(() => new MACSigner(testSecret(31, 1))).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.INVALID_KEY_MATERIAL,
        message: 'The HMAC secret must be at least 256 bits (got 248 bits)',
      }),
    )
  })

  it('rejects secrets shorter than the hash of the algorithm', () => {
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS512).build()

    expect(() => new MACSigner(testSecret(32, 1)).sign(header, INPUT)).toThrow(
      'The secret for HS512 must be at least 512 bits (got 256 bits)',
    )
  })
})

describe('MACVerifier', () => {
  const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).build()
  const mac = new MACSigner(testSecret(32, 1)).sign(header, INPUT)

  it('returns false for a modified MAC or input', () => {
    const tampered = new Uint8Array(mac)
    tampered[0] ^= 1

    expect(new MACVerifier(testSecret(32, 1)).verify(header, INPUT, tampered)).toBe(false)
    expect(new MACVerifier(testSecret(32, 1)).verify(header, toUtf8Bytes('other'), mac)).toBe(false)
  })

  it('returns false for a truncated MAC', () => {
    expect(new MACVerifier(testSecret(32, 1)).verify(header, INPUT, mac.slice(0, 16))).toBe(false)
  })
})
