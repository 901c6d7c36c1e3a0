import { CompressionAlgorithm } from '../algorithms/compression-algorithm'
import { EncryptionMethod } from '../algorithms/encryption-method'
import { JOSEObjectType } from '../algorithms/jose-object-type'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { JWSAlgorithm } from '../algorithms/jws-algorithm'
import { JoseErrorCode } from '../errors/jose.error'
import { base64UrlEncodeString } from '../utils/encoding'
import { parseJsonObject } from '../utils/json'

import { parseHeader, parseHeaderBase64Url, parseHeaderString } from './header-parser'
import { JWEHeader, JWEHeaderBuilder } from './jwe-header'
import { JWSHeader, JWSHeaderBuilder } from './jws-header'
import { PlainHeader, PlainHeaderBuilder } from './plain-header'

import type { JsonObject } from '../utils/json'

describe('parseHeader', () => {
  it('infers the header kind from alg and enc', () => {
    expect(parseHeader({ alg: 'none' })).toBeInstanceOf(PlainHeader)
    expect(parseHeader({ alg: 'HS256' })).toBeInstanceOf(JWSHeader)
    expect(parseHeader({ alg: 'RSA1_5', enc: 'A128CBC-HS256' })).toBeInstanceOf(JWEHeader)
  })

  it('requires a string alg', () => {
    expect(() => parseHeader({ typ: 'JWT' })).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR, details: { field: 'alg' } }),
    )
    expect(() => parseHeader({ alg: 1 })).toThrow(expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR }))
  })

  it('rejects invalid JSON text and non-object roots', () => {
    expect(() => parseHeaderString('[1]')).toThrow('Invalid JOSE header: JSON text is not an object')
    expect(() => parseHeaderString('{')).toThrow(expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR }))
  })

  it('remembers the exact segment it was decoded from', () => {
    const segment = base64UrlEncodeString('{"alg":"HS256",  "kid":"a"}')
    const header = parseHeaderBase64Url(segment)

    expect(header.toBase64Url()).toBe(segment)
    expect(header.toString()).toBe('{"alg":"HS256","kid":"a"}')
  })

  it('rejects a mistyped reserved member', () => {
    expect(() => parseHeader({ alg: 'HS256', kid: 7 })).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.PARSE_ERROR,
        message: 'Unexpected type of JSON object member "kid": expected string',
      }),
    )
    expect(() => parseHeader({ alg: 'HS256', crit: [] })).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR }),
    )
    expect(() => parseHeader({ alg: 'HS256', jku: 'not a url' })).toThrow('Invalid URL in JSON object member "jku"')
  })

  it('rejects an x5c that is not an array of base64 strings', () => {
    expect(() => parseHeader({ alg: 'HS256', x5c: 'AQID' })).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.PARSE_ERROR,
        message: 'Unexpected type of JSON object member "x5c": expected array',
        details: { field: 'x5c' },
      }),
    )
    expect(() => parseHeader({ alg: 'HS256', x5c: ['AQID', 1] })).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.PARSE_ERROR,
        message: 'Unexpected type of JSON object member "x5c": expected array of strings',
        details: { field: 'x5c' },
      }),
    )
    expect(() => parseHeader({ alg: 'HS256', x5c: ['not base64!'] })).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR, details: { field: 'x5c' } }),
    )
  })

  it('rejects null for a reserved member', () => {
    expect(() => parseHeader({ alg: 'HS256', kid: null })).toThrow(
      expect.objectContaining({
        code: JoseErrorCode.PARSE_ERROR,
        message: 'Unexpected type of JSON object member "kid": expected string',
        details: { field: 'kid' },
      }),
    )
    expect(() => parseHeader({ alg: 'HS256', typ: null })).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR, details: { field: 'typ' } }),
    )
  })

  it('passes null through in a custom parameter', () => {
    const header = parseHeader({ alg: 'HS256', note: null })

    expect(header.getCustomParam('note')).toBeNull()
    expect(header.toString()).toBe('{"alg":"HS256","note":null}')
  })
})

describe('PlainHeader', () => {
  it('encodes the minimal header', () => {
    const header = new PlainHeaderBuilder().build()

    expect(header.toString()).toBe('{"alg":"none"}')
    expect(header.toBase64Url()).toBe('eyJhbGciOiJub25lIn0')
  })

  it('treats kid as a custom parameter', () => {
    const header = parseHeader({ alg: 'none', kid: 'k' })

    expect(header.customParams).toEqual({ kid: 'k' })
  })

  it('rejects a non-none algorithm when parsed directly', () => {
    expect(() => PlainHeader.parse({ alg: 'HS256' })).toThrow('The algorithm "alg" header parameter must be "none"')
  })
})

describe('JWSHeader', () => {
  it('serializes alg first, reserved members, then custom parameters', () => {
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256)
      .customParam('exp', 1)
      .keyId('k1')
      .type(JOSEObjectType.JWT)
      .contentType('text/plain')
      .build()

    expect(header.toString()).toBe('{"alg":"HS256","typ":"JWT","cty":"text/plain","kid":"k1","exp":1}')
    expect(header.includedParams).toEqual(['alg', 'typ', 'cty', 'kid', 'exp'])
  })

  it('encodes the minimal header', () => {
    expect(new JWSHeaderBuilder(JWSAlgorithm.HS256).build().toBase64Url()).toBe('eyJhbGciOiJIUzI1NiJ9')
  })

  it('refuses none and reserved custom names', () => {
    expect(() => new JWSHeader(JWSAlgorithm.parse('none'))).toThrow(
      expect.objectContaining({ code: JoseErrorCode.INVALID_ARGUMENT, details: { field: 'alg' } }),
    )
    expect(() => new JWSHeaderBuilder(JWSAlgorithm.HS256).customParam('kid', 'x')).toThrow(
      'The parameter name "kid" matches a reserved name',
    )
    expect(() => new JWSHeaderBuilder(JWSAlgorithm.HS256).criticalParams([]).build()).toThrow(
      expect.objectContaining({ code: JoseErrorCode.INVALID_ARGUMENT, details: { field: 'crit' } }),
    )
  })

  it('parses b64 and custom parameters', () => {
    const header = JWSHeader.parse({ alg: 'HS256', b64: false, crit: ['b64'], tenant: 'acme' })

    expect(header.base64UrlEncodePayload).toBe(false)
    expect(header.criticalParams).toEqual(['b64'])
    expect(header.getCustomParam('tenant')).toBe('acme')
    expect(header.getCustomParam('b64')).toBeUndefined()
    expect(header.toString()).toBe('{"alg":"HS256","crit":["b64"],"b64":false,"tenant":"acme"}')
  })

  it('keeps a __proto__ custom parameter as plain data', () => {
    const header = JWSHeader.parse(parseJsonObject('{"alg":"HS256","__proto__":{"x":1}}'))
    const built = new JWSHeaderBuilder(JWSAlgorithm.HS256).customParam('__proto__', { x: 1 }).build()

    expect(Object.keys(header.customParams)).toEqual(['__proto__'])
    expect(header.getCustomParam('__proto__')).toEqual({ x: 1 })
    expect(header.toString()).toBe('{"alg":"HS256","__proto__":{"x":1}}')
    expect(Object.keys(JWSHeader.parse(header.toJSON()).customParams)).toEqual(['__proto__'])
    expect(built.toString()).toBe('{"alg":"HS256","__proto__":{"x":1}}')
  })

  it('reads only its own custom parameters', () => {
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).customParam('tenant', 'acme').build()

    expect(header.getCustomParam('constructor')).toBeUndefined()
    expect(header.getCustomParam('toString')).toBeUndefined()
    expect(header.getCustomParam('tenant')).toBe('acme')
  })

  it('deep copies and freezes custom parameters', () => {
    const ext: JsonObject = { level: 1, tags: ['a'] }
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).customParam('ext', ext).build()
    const segment = header.toBase64Url()
    ext.level = 2
    ext.tags = ['b']

    const stored = header.getCustomParam('ext')
    expect(stored).toEqual({ level: 1, tags: ['a'] })
    expect(Object.isFrozen(header.customParams)).toBe(true)
    expect(Object.isFrozen(stored)).toBe(true)
    expect(header.toBase64Url()).toBe(segment)
    expect(header.toString()).toBe('{"alg":"HS256","ext":{"level":1,"tags":["a"]}}')
  })

  it('hands out JSON that does not reach into the header', () => {
    const header = new JWSHeaderBuilder(JWSAlgorithm.HS256).customParam('ext', { level: 1 }).build()
    const json = header.toJSON()
    json.ext = 'changed'

    expect(header.toString()).toBe('{"alg":"HS256","ext":{"level":1}}')
  })

  it('keeps unknown algorithm names', () => {
    const header = JWSHeader.parse({ alg: 'EdDSA' })

    expect(header.algorithm.name).toBe('EdDSA')
    expect(header.algorithm.requirement).toBeUndefined()
  })

  it('copies a header without its parsed segment', () => {
    const parsed = parseHeaderBase64Url(base64UrlEncodeString('{"kid":"a", "alg":"HS256"}'))
    if (!(parsed instanceof JWSHeader)) throw new Error('expected a JWS header')

    const copy = JWSHeaderBuilder.from(parsed).type(JOSEObjectType.JOSE).build()

    expect(copy.parsedBase64Url).toBeUndefined()
    expect(copy.toString()).toBe('{"alg":"HS256","typ":"JOSE","kid":"a"}')
  })
})

describe('JWEHeader', () => {
  it('requires enc', () => {
    expect(() => JWEHeader.parse({ alg: 'dir' })).toThrow(
      expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR, message: 'Missing JSON object member "enc"' }),
    )
  })

  it('serializes enc and the JWE members after alg', () => {
    const header = new JWEHeaderBuilder(JWEAlgorithm.DIR, EncryptionMethod.A256GCM)
      .keyId('k')
      .compression(CompressionAlgorithm.DEF)
      .agreementPartyUInfo('YWxpY2U')
      .build()

    expect(header.toString()).toBe('{"alg":"dir","enc":"A256GCM","kid":"k","zip":"DEF","apu":"YWxpY2U"}')
  })

  it('validates p2c and base64url members', () => {
    expect(() => new JWEHeaderBuilder(JWEAlgorithm.DIR, EncryptionMethod.A128GCM).pbes2Count(0).build()).toThrow(
      'The "p2c" parameter must be a positive integer',
    )
    expect(() => new JWEHeaderBuilder(JWEAlgorithm.DIR, EncryptionMethod.A128GCM).iv('a b').build()).toThrow(
      'The "iv" parameter must be base64url',
    )
  })

  it('round trips through its JSON form', () => {
    const header = JWEHeader.parse({ alg: 'RSA-OAEP-256', enc: 'A128CBC-HS256', zip: 'DEF', p2c: 10, x: [1] })
    const again = JWEHeader.parse(header.toJSON())

    expect(again.algorithm).toBe(JWEAlgorithm.RSA_OAEP_256)
    expect(again.encryptionMethod).toBe(EncryptionMethod.A128CBC_HS256)
    expect(again.compression?.name).toBe('DEF')
    expect(again.pbes2Count).toBe(10)
    expect(again.customParams).toEqual({ x: [1] })
  })
})
