import { Buffer } from 'node:buffer'

import { NestFactory } from '@nestjs/core'

import { EncryptionMethod } from '../../src/algorithms/encryption-method'
import { JOSEObjectType } from '../../src/algorithms/jose-object-type'
import { JoseErrorCode } from '../../src/errors/jose.error'
import { parseJOSEObject } from '../../src/jose/jose-object'
import { JsonWebEncryptionService } from '../../src/services/json-web-encryption.service'
import { JsonWebSignatureService } from '../../src/services/json-web-signature.service'
import { JwkSetService } from '../../src/services/jwk-set.service'
import { expectCompact, expectJoseError } from '../utils/assertions'

import { E2E_KIDS, TestAppModule } from './test-app.module'

import type { INestApplicationContext } from '@nestjs/common'

describe('JOSE workflow (e2e)', () => {
  let app: INestApplicationContext
  let jws: JsonWebSignatureService
  let jwe: JsonWebEncryptionService
  let keys: JwkSetService

  beforeAll(async () => {
    app = await NestFactory.createApplicationContext(TestAppModule, { logger: false })
    jws = app.get(JsonWebSignatureService)
    jwe = app.get(JsonWebEncryptionService)
    keys = app.get(JwkSetService)
  })

  afterAll(async () => {
    await app?.close()
  })

  it('signs with the first signing key and verifies', async () => {
    const token = await jws.sign({ sub: 'alice' })
    expectCompact(token, 3)

    const result = await jws.verify(token)
    expect(result.valid).toBe(true)
    expect(result.key?.keyId).toBe(E2E_KIDS.hmac)
    expect(result.object.header.algorithm.name).toBe('HS256')
    expect(result.object.payload.toJson()).toEqual({ sub: 'alice' })
  })

  it('signs with the algorithm a key names', async () => {
    const token = await jws.sign('pss', { kid: E2E_KIDS.rsaSig })
    const result = await jws.verify(token)

    expect(result.object.header.algorithm.name).toBe('PS256')
    expect(result.key?.keyId).toBe(E2E_KIDS.rsaSig)
  })

  it('reports a tampered payload as invalid', async () => {
    const [header, , signature] = (await jws.sign('original')).split('.')
    const result = await jws.verify(`${header}.dGFtcGVyZWQ.${signature}`)

    expect(result.valid).toBe(false)
    expect(result.object.payload.toString()).toBe('tampered')
  })

  it('encrypts to the first encryption key and decrypts', async () => {
    const token = await jwe.encrypt('for the server')
    expectCompact(token, 5)

    const result = await jwe.decrypt(token)
    expect(result.header.algorithm.name).toBe('RSA-OAEP-256')
    expect(result.header.encryptionMethod.name).toBe('A256GCM')
    expect(result.key.keyId).toBe(E2E_KIDS.rsaEnc)
  })

  it('nests a signed JWT inside a JWE', async () => {
    const signed = await jws.sign({ sub: 'bob', scope: 'read' }, { kid: E2E_KIDS.ecSig, typ: JOSEObjectType.JWT })
    const sealed = await jwe.encrypt(signed, {
      kid: E2E_KIDS.dir,
      enc: EncryptionMethod.A256GCM,
      contentType: 'JWT',
    })

    const outer = parseJOSEObject(sealed)
    expect(outer.kind).toBe('jwe')

    const { plaintext, header } = await jwe.decrypt(sealed)
    expect(header.contentType).toBe('JWT')
    const inner = await jws.verify(Buffer.from(plaintext).toString('utf8'))
    expect(inner.valid).toBe(true)
    expect(inner.key?.keyId).toBe(E2E_KIDS.ecSig)
    expect(inner.object.header.type?.type).toBe('JWT')
    expect(inner.object.payload.toJson()).toEqual({ sub: 'bob', scope: 'read' })
  })

  it('publishes the public keys only', () => {
    const published = keys.getPublicJwkSet()
    const entries = Array.isArray(published.keys) ? published.keys : []

    expect(entries).toEqual([
      expect.objectContaining({ kid: E2E_KIDS.rsaSig, kty: 'RSA' }),
      expect.objectContaining({ kid: E2E_KIDS.ecSig, kty: 'EC' }),
      expect.objectContaining({ kid: E2E_KIDS.rsaEnc, kty: 'RSA' }),
    ])
    for (const entry of entries) expect(entry).not.toHaveProperty('d')
  })

  it('rejects a JWE sent to verify', async () => {
    const sealed = await jwe.encrypt('x', { kid: E2E_KIDS.dir })

    await expectJoseError(jws.verify(sealed), JoseErrorCode.PARSE_ERROR)
  })
})
