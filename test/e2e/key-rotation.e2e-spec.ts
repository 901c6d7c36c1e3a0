import { Test } from '@nestjs/testing'

import { JoseErrorCode } from '../../src/errors/jose.error'
import { JWSObject } from '../../src/jose/jws-object'
import { EnvJwkSetSource } from '../../src/keystore/env-jwk-set-source'
import { JWK_SET_SOURCE, JoseModule } from '../../src/module/jose.module'
import { JsonWebEncryptionService } from '../../src/services/json-web-encryption.service'
import { JsonWebSignatureService } from '../../src/services/json-web-signature.service'
import { octKey } from '../fixtures/test-keys'
import { expectJoseError } from '../utils/assertions'
import { TestJwkSetBuilder } from '../utils/jwk-set-builders'

import type { InMemoryJwkSetSource } from '../../src/keystore/in-memory-jwk-set-source'
import type { TestingModule } from '@nestjs/testing'

describe('Key rotation workflows (e2e)', () => {
  let moduleRef: TestingModule
  let source: InMemoryJwkSetSource
  let jws: JsonWebSignatureService
  let jwe: JsonWebEncryptionService

  beforeEach(async () => {
    source = new TestJwkSetBuilder()
      .withActiveKid('key-v1')
      .withOctKey('key-v1', 32, 1)
      .withOctKey('key-v2', 32, 2)
      .build()

    moduleRef = await Test.createTestingModule({
      imports: [JoseModule.register()],
    })
      .overrideProvider(JWK_SET_SOURCE)
      .useValue(source)
      .compile()
    moduleRef.useLogger(false)
    await moduleRef.init()

    jws = moduleRef.get(JsonWebSignatureService)
    jwe = moduleRef.get(JsonWebEncryptionService)
  })

  afterEach(async () => {
    await moduleRef?.close()
  })

  it('verifies old signatures after the active key changes', async () => {
    const before = await jws.sign('signed with v1')
    source.setActiveKeyId('key-v2')
    const after = await jws.sign('signed with v2')

    expect(JWSObject.parse(before).header.keyId).toBe('key-v1')
    expect(JWSObject.parse(after).header.keyId).toBe('key-v2')
    await expect(jws.verify(before)).resolves.toMatchObject({ valid: true })
    await expect(jws.verify(after)).resolves.toMatchObject({ valid: true })
  })

  it('decrypts old tokens after the active key changes', async () => {
    const tokens: string[] = []
    for (let i = 0; i < 5; i++) tokens.push(await jwe.encrypt(`message-${i}`))
    source.setActiveKeyId('key-v2')
    for (let i = 5; i < 10; i++) tokens.push(await jwe.encrypt(`message-${i}`))

    const decrypted = await Promise.all(tokens.map(token => jwe.decryptToString(token)))

    expect(decrypted).toEqual(Array.from({ length: 10 }, (_, i) => `message-${i}`))
  })

  it('stops accepting tokens of a retired key', async () => {
    const signed = await jws.sign('short lived')
    const sealed = await jwe.encrypt('short lived')

    source.setActiveKeyId('key-v2')
    source.removeKey('key-v1')

    await expectJoseError(jws.verify(signed), JoseErrorCode.KEY_NOT_FOUND, 'No key matches the JWS header')
    await expectJoseError(jwe.decrypt(sealed), JoseErrorCode.KEY_NOT_FOUND, 'No key matches the JWE header')
  })

  it('picks up keys added at run time', async () => {
    source.addKey(octKey(32, 3, { keyId: 'key-v3' }))
    source.setActiveKeyId('key-v3')

    const token = await jws.sign('fresh')
    const result = await jws.verify(token)

    expect(result.key?.keyId).toBe('key-v3')
  })

  it('reloads an environment-backed set', async () => {
    const env: NodeJS.ProcessEnv = new TestJwkSetBuilder().withActiveKid('env-v1').withOctKey('env-v1', 32, 4).buildEnv()
    const envSource = new EnvJwkSetSource({ env })
    const envModule = await Test.createTestingModule({
      imports: [JoseModule.register()],
    })
      .overrideProvider(JWK_SET_SOURCE)
      .useValue(envSource)
      .compile()
    const envJws = envModule.get(JsonWebSignatureService)
    const old = await envJws.sign('before reload')

    Object.assign(
      env,
      new TestJwkSetBuilder().withActiveKid('env-v2').withOctKey('env-v1', 32, 4).withOctKey('env-v2', 32, 5).buildEnv(),
    )
    envSource.reload()

    expect(JWSObject.parse(await envJws.sign('after reload')).header.keyId).toBe('env-v2')
    await expect(envJws.verify(old)).resolves.toMatchObject({ valid: true })
    await envModule.close()
  })
})
