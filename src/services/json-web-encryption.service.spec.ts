import { Buffer } from 'node:buffer'

import { Logger } from '@nestjs/common'

import { EncryptionMethod } from '../algorithms/encryption-method'
import { JWEAlgorithm } from '../algorithms/jwe-algorithm'
import { resolveJoseOptions } from '../config/jose.options'
import { JoseErrorCode } from '../errors/jose.error'
import { JWEObject } from '../jose/jwe-object'
import { octKey, rsaKey } from '../../test/fixtures/test-keys'
import { expectCompact, expectJoseError } from '../../test/utils/assertions'
import { TestJwkSetBuilder } from '../../test/utils/jwk-set-builders'

import { JsonWebEncryptionService } from './json-web-encryption.service'

import type { JoseModuleOptions } from '../config/jose.options'
import type { InMemoryJwkSetSource } from '../keystore/in-memory-jwk-set-source'

function service(source: InMemoryJwkSetSource, options: JoseModuleOptions = {}, logger?: Logger) {
  return new JsonWebEncryptionService(source, resolveJoseOptions(options), logger)
}

describe('JsonWebEncryptionService', () => {
  let logger: Logger
  let warn: jest.SpyInstance

  beforeEach(() => {
    logger = new Logger('JsonWebEncryptionServiceTest')
    warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined)
  })

  describe('encrypt', () => {
    it('uses direct encryption with a secret key', async () => {
      const svc = service(new TestJwkSetBuilder().withActiveKid('K1').withOctKey('K1', 32, 3).build())
      const jwe = await svc.encrypt('top secret')

      expectCompact(jwe, 5)
      expect(jwe.split('.')[1]).toBe('')
      expect(JWEObject.parse(jwe).header.toJSON()).toEqual({ alg: 'dir', enc: 'A256GCM', kid: 'K1' })
      await expect(svc.decryptToString(jwe)).resolves.toBe('top secret')
    })

    it('wraps the content key with an AES key wrap key', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('W1', 16, 4, 'enc', JWEAlgorithm.A128KW).build())
      const jwe = await svc.encrypt({ n: 1 })

      expect(JWEObject.parse(jwe).header.algorithm.name).toBe('A128KW')
      expect(jwe.split('.')[1]).toHaveLength(54)
      await expect(svc.decryptToString(jwe)).resolves.toBe('{"n":1}')
    })

    it('encrypts to RSA and EC keys', async () => {
      const rsa = service(new TestJwkSetBuilder().withRsaKey('R1', 'enc').build())
      const ec = service(new TestJwkSetBuilder().withEcKey('E1', 'prime256v1', 'enc').build())

      const toRsa = await rsa.encrypt('for rsa')
      const toEc = await ec.encrypt('for ec')

      expect(JWEObject.parse(toRsa).header.algorithm.name).toBe('RSA-OAEP-256')
      const ecHeader = JWEObject.parse(toEc).header
      expect(ecHeader.algorithm.name).toBe('ECDH-ES')
      expect(ecHeader.ephemeralPublicKey?.curve.name).toBe('P-256')
      await expect(rsa.decryptToString(toRsa)).resolves.toBe('for rsa')
      await expect(ec.decryptToString(toEc)).resolves.toBe('for ec')
    })

    it('honours enc, compression and custom parameters', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('K1', 32, 3).build())
      const text = 'repeat '.repeat(200)
      const jwe = await svc.encrypt(text, {
        enc: EncryptionMethod.A128CBC_HS256,
        compress: true,
        contentType: 'text/plain',
        customParams: { tenant: 'acme' },
      })

      const { plaintext, header, key } = await svc.decrypt(jwe)
      expect(header.toJSON()).toEqual({
        alg: 'dir',
        enc: 'A128CBC-HS256',
        cty: 'text/plain',
        kid: 'K1',
        zip: 'DEF',
        tenant: 'acme',
      })
      expect(Buffer.from(plaintext).toString('utf8')).toBe(text)
      expect(key.keyId).toBe('K1')
    })

    it('rejects unknown keys and signing keys', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('S1', 32, 1, 'sig').build())

      await expectJoseError(svc.encrypt('x', { kid: 'nope' }), JoseErrorCode.KEY_NOT_FOUND, 'No encryption key with kid "nope"')
      await expectJoseError(svc.encrypt('x', { kid: 'S1' }), JoseErrorCode.KEY_NOT_FOUND, 'No encryption key with kid "S1"')
      await expectJoseError(svc.encrypt('x'), JoseErrorCode.KEY_NOT_FOUND, 'No encryption key in the JWK set')
    })

    it('picks the first key that fits a requested algorithm', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('K1', 32, 1).withOctKey('W1', 16, 2).build())
      const jwe = await svc.encrypt('x', { alg: JWEAlgorithm.A128KW })

      expect(JWEObject.parse(jwe).header.keyId).toBe('W1')
    })

    it('only uses accepted algorithms and methods', async () => {
      const rsa = service(new TestJwkSetBuilder().withRsaKey('R1').build(), {
        acceptedJweAlgorithms: [JWEAlgorithm.DIR],
      })
      const oct = service(new TestJwkSetBuilder().withOctKey('K1', 16, 1).build(), {
        acceptedEncryptionMethods: [EncryptionMethod.A256GCM],
      })

      await expectJoseError(rsa.encrypt('x'), JoseErrorCode.ALG_NOT_ACCEPTED, 'The "RSA-OAEP-256" algorithm is not accepted')
      await expectJoseError(
        oct.encrypt('x', { enc: EncryptionMethod.A128GCM }),
        JoseErrorCode.ALG_NOT_ACCEPTED,
        'The "A128GCM" encryption method is not accepted',
      )
    })
  })

  describe('decrypt', () => {
    it('tries each candidate key in set order', async () => {
      const sender = service(new TestJwkSetBuilder().withKey(octKey(32, 1)).build())
      const receiver = service(new TestJwkSetBuilder().withKey(octKey(32, 2)).withKey(octKey(32, 1)).build())

      const result = await receiver.decrypt(await sender.encrypt('rotated'))

      expect(Buffer.from(result.plaintext).toString('utf8')).toBe('rotated')
      expect(result.key.equals(octKey(32, 1))).toBe(true)
    })

    it('throws the last failure when no key decrypts', async () => {
      const sender = service(new TestJwkSetBuilder().withOctKey('K1', 32, 1).build())
      const receiver = service(new TestJwkSetBuilder().withOctKey('K1', 32, 2).build(), {}, logger)

      await expectJoseError(receiver.decrypt(await sender.encrypt('x')), JoseErrorCode.DECRYPT_FAILED)
      expect(warn).toHaveBeenCalledWith('JWE not decrypted by any candidate key', {
        alg: 'dir',
        kid: 'K1',
        candidates: 1,
      })
    })

    it('needs a private key', async () => {
      const publicOnly = rsaKey({ keyId: 'R1' }).toPublicJWK()
      const svc = service(new TestJwkSetBuilder().withKey(publicOnly).build(), {}, logger)
      const jwe = await svc.encrypt('one way')

      await expectJoseError(svc.decrypt(jwe), JoseErrorCode.KEY_NOT_FOUND, 'No key matches the JWE header')
      expect(warn).toHaveBeenCalledWith('No key matches the JWE header', { alg: 'RSA-OAEP-256', kid: 'R1' })
    })

    it('applies per-call accepted methods', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('K1').build())
      const jwe = await svc.encrypt('x')

      await expectJoseError(
        svc.decrypt(jwe, { acceptedEncryptionMethods: [EncryptionMethod.A128CBC_HS256] }),
        JoseErrorCode.ALG_NOT_ACCEPTED,
        'The "A256GCM" encryption method is not accepted by the JWE decrypter',
      )
    })

    it('enforces the size limit before parsing', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('K1').build(), { maxCompactLength: 8 })

      await expectJoseError(
        svc.decrypt('a.b.c.d.e.f'),
        JoseErrorCode.SIZE_LIMIT_EXCEEDED,
        'Compact JWE exceeds maximum size of 8 characters (got 11)',
      )
    })

    it('rejects a JWS', async () => {
      const svc = service(new TestJwkSetBuilder().withOctKey('K1').build())

      await expectJoseError(svc.decrypt('eyJhbGciOiJIUzI1NiJ9.aGVsbG8.c2ln'), JoseErrorCode.PARSE_ERROR)
    })
  })
})
