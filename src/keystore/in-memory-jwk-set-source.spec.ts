import { JoseErrorCode } from '../errors/jose.error'
import { JWKSet } from '../jwk/jwk-set'
import { octKey } from '../../test/fixtures/test-keys'

import { InMemoryJwkSetSource } from './in-memory-jwk-set-source'

describe('InMemoryJwkSetSource', () => {
  it('starts empty', () => {
    const source = new InMemoryJwkSetSource()

    expect(source.getJwkSet().size).toBe(0)
    expect(source.getActiveKeyId()).toBeUndefined()
  })

  it('publishes a new set on every change', () => {
    const source = new InMemoryJwkSetSource([octKey(32, 1, { keyId: 'a' })], 'a')
    const before = source.getJwkSet()

    source.addKey(octKey(32, 2, { keyId: 'b' }))

    expect(before.keys.map(key => key.keyId)).toEqual(['a'])
    expect(source.getJwkSet().keys.map(key => key.keyId)).toEqual(['a', 'b'])
  })

  it('replaces a key with the same kid', () => {
    const source = new InMemoryJwkSetSource([octKey(32, 1, { keyId: 'a' }), octKey(32, 2, { keyId: 'b' })])
    const replacement = octKey(32, 3, { keyId: 'a' })

    source.addKey(replacement)

    expect(source.getJwkSet().keys.map(key => key.keyId)).toEqual(['b', 'a'])
    expect(source.getJwkSet().getKeyByKeyId('a')).toBe(replacement)
  })

  it('removes keys and clears a removed active kid', () => {
    const source = new InMemoryJwkSetSource([octKey(32, 1, { keyId: 'a' }), octKey(32, 2, { keyId: 'b' })], 'a')

    source.removeKey('a')

    expect(source.getJwkSet().size).toBe(1)
    expect(source.getActiveKeyId()).toBeUndefined()
    expect(() => source.removeKey('a')).toThrow(
      expect.objectContaining({ code: JoseErrorCode.KEY_NOT_FOUND, message: 'No key with kid "a"' }),
    )
  })

  it('only activates known keys', () => {
    const source = new InMemoryJwkSetSource([octKey(32, 1, { keyId: 'a' })])

    source.setActiveKeyId('a')
    expect(source.getActiveKeyId()).toBe('a')
    expect(() => source.setActiveKeyId('z')).toThrow(expect.objectContaining({ code: JoseErrorCode.KEY_NOT_FOUND }))
    source.setActiveKeyId(undefined)
    expect(source.getActiveKeyId()).toBeUndefined()
  })

  it('replaces the whole set', () => {
    const source = new InMemoryJwkSetSource([octKey(32, 1, { keyId: 'a' })], 'a')

    source.replace(new JWKSet([octKey(32, 2, { keyId: 'c' })]), 'c')

    expect(source.getJwkSet().keys.map(key => key.keyId)).toEqual(['c'])
    expect(source.getActiveKeyId()).toBe('c')
  })
})
