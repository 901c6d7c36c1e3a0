import { JoseErrorCode } from '../errors/jose.error'

import {
  base64Decode,
  base64Encode,
  base64UrlDecode,
  base64UrlDecodeToString,
  base64UrlEncode,
  base64UrlEncodeString,
  fromUtf8Bytes,
  isBase64Url,
  toUtf8Bytes,
} from './encoding'

describe('encoding utilities', () => {
  describe('toUtf8Bytes / fromUtf8Bytes', () => {
    it('converts empty string', () => {
      const result = toUtf8Bytes('')
      expect(result).toBeInstanceOf(Uint8Array)
      expect(result.length).toBe(0)
    })

    it('converts ASCII string', () => {
      expect([...toUtf8Bytes('hello')]).toEqual([104, 101, 108, 108, 111])
    })

    it('encodes multi-byte characters', () => {
      expect([...toUtf8Bytes('é')]).toEqual([0xc3, 0xa9])
    })

    it('handles invalid UTF-8 with replacement', () => {
      expect(fromUtf8Bytes(new Uint8Array([0xff]))).toBe('\uFFFD')
    })
  })

  describe('base64UrlEncode', () => {
    it('encodes without padding using the URL-safe alphabet', () => {
      expect(base64UrlEncode(new Uint8Array([0xfb, 0xff]))).toBe('-_8')
      expect(base64UrlEncode(new Uint8Array([1, 2, 3]))).toBe('AQID')
    })

    it('encodes strings as UTF-8', () => {
      expect(base64UrlEncodeString('{"alg":"none"}')).toBe('eyJhbGciOiJub25lIn0')
    })
  })

  describe('base64UrlDecode', () => {
    it('decodes URL-safe characters', () => {
      expect([...base64UrlDecode('-_8')]).toEqual([0xfb, 0xff])
    })

    it('decodes to string', () => {
      expect(base64UrlDecodeToString('eyJhbGciOiJub25lIn0')).toBe('{"alg":"none"}')
    })

    it('decodes the empty string', () => {
      expect(base64UrlDecode('').length).toBe(0)
    })

    it('rejects illegal characters', () => {
      expect(() => base64UrlDecode('ab+/')).toThrow(
        expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR }),
      )
    })

    it('rejects impossible lengths and names the field', () => {
      expect(() => base64UrlDecode('abcde', 'x')).toThrow(
        expect.objectContaining({ details: { field: 'x' } }),
      )
    })
  })

  describe('isBase64Url', () => {
    it('accepts the URL-safe alphabet only', () => {
      expect(isBase64Url('abc-_09')).toBe(true)
      expect(isBase64Url('abc=')).toBe(false)
      expect(isBase64Url('a.b')).toBe(false)
    })
  })

  describe('base64', () => {
    it('round-trips padded standard base64', () => {
      expect(base64Encode(new Uint8Array([0xfb, 0xff]))).toBe('+/8=')
      expect([...base64Decode('+/8=')]).toEqual([0xfb, 0xff])
    })

    it('rejects URL-safe characters', () => {
      expect(() => base64Decode('-_8=', 'x5c')).toThrow(
        expect.objectContaining({ code: JoseErrorCode.PARSE_ERROR }),
      )
    })
  })
})
