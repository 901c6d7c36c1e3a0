import { Module } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'

import { JoseModule } from '../../src/module/jose.module'
import { JsonWebSignatureService } from '../../src/services/json-web-signature.service'
import { JwkSetService } from '../../src/services/jwk-set.service'
import { TestJwkSetBuilder } from '../utils/jwk-set-builders'

import { E2E_KIDS, TestAppModule } from './test-app.module'

import type { JoseModuleOptions } from '../../src/config/jose.options'
import type { INestApplicationContext } from '@nestjs/common'

const JOSE_SETTINGS = 'JOSE_SETTINGS'

@Module({
  providers: [
    {
      provide: JOSE_SETTINGS,
      useFactory: (): JoseModuleOptions => ({
        jwks: { env: { env: new TestJwkSetBuilder().withActiveKid('cfg-1').withEcKey('cfg-1', 'secp384r1').buildEnv() } },
      }),
    },
  ],
  exports: [JOSE_SETTINGS],
})
class SettingsModule {}

@Module({
  imports: [
    JoseModule.registerAsync({
      imports: [SettingsModule],
      useFactory: (...args: unknown[]) => {
        const [settings] = args
        return isJoseOptions(settings) ? settings : {}
      },
      inject: [JOSE_SETTINGS],
    }),
  ],
})
class AsyncAppModule {}

function isJoseOptions(value: unknown): value is JoseModuleOptions {
  return typeof value === 'object' && value !== null
}

describe('JoseModule registration (e2e)', () => {
  let app: INestApplicationContext | undefined

  afterEach(async () => {
    await app?.close()
    app = undefined
  })

  it('boots with an inline set', async () => {
    app = await NestFactory.createApplicationContext(TestAppModule, { logger: false })

    expect(app.get(JwkSetService).getJwkSet().size).toBe(5)
    expect(app.get(JwkSetService).getByKeyId(E2E_KIDS.dir).kty).toBe('oct')
  })

  it('boots with async options from another module', async () => {
    app = await NestFactory.createApplicationContext(AsyncAppModule, { logger: false })

    const jws = app.get(JsonWebSignatureService)
    const result = await jws.verify(await jws.sign('async'))

    expect(app.get(JwkSetService).getActiveKeyId()).toBe('cfg-1')
    expect(result.object.header.algorithm.name).toBe('ES384')
    expect(result.key?.keyId).toBe('cfg-1')
  })
})
