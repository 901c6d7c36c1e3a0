import { Buffer } from 'node:buffer'

import { bytesEqual, concatBytes, toBytes, uint64BigEndian, zeroize } from './bytes'

describe('utils/bytes', () => {
  it('toBytes converts from string/Uint8Array/Buffer', () => {
    expect([...toBytes('abc')]).toEqual([97, 98, 99])
    const b = new Uint8Array([1, 2, 3])
    expect(toBytes(b)).toBe(b)
    const c = toBytes(Buffer.from([4, 5]))
    expect(c).toBeInstanceOf(Uint8Array)
    expect([...c]).toEqual([4, 5])
  })

  it('concatBytes joins chunks in order', () => {
    const out = concatBytes(new Uint8Array([1]), new Uint8Array([2, 3]), new Uint8Array([4]))
    expect([...out]).toEqual([1, 2, 3, 4])
  })

  it('bytesEqual compares content and length', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true)
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false)
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1]))).toBe(false)
  })

  it('uint64BigEndian encodes bit lengths', () => {
    expect([...uint64BigEndian(408)]).toEqual([0, 0, 0, 0, 0, 0, 1, 152])
  })

  it('zeroize overwrites bytes with zeros', () => {
    const x = new Uint8Array([9, 9, 9])
    zeroize(x)
    expect([...x]).toEqual([0, 0, 0])
  })
})
