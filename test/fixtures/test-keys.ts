import { Buffer } from 'node:buffer'
import { generateKeyPairSync } from 'node:crypto'

import { jwkFromKeyObject } from '../../src/jwk/jwk'
import { OctetSequenceKeyBuilder } from '../../src/jwk/octet-sequence-key'

import type { KeyObject } from 'node:crypto'
import type { JWKCommonParams } from '../../src/jwk/base-jwk'
import type { ECKey } from '../../src/jwk/ec-key'
import type { JWK } from '../../src/jwk/jwk'
import type { OctetSequenceKey } from '../../src/jwk/octet-sequence-key'
import type { RSAKey } from '../../src/jwk/rsa-key'

/**
 * Common test key IDs used across test suites.
 */
export const TEST_KEY_IDS = {
  DEFAULT: 'K1',
  V1: 'key-v1',
  V2: 'key-v2',
} as const

/** Fixed-byte secrets; `fill` tells keys apart. */
export function testSecret(bytes: number, fill: number): Uint8Array {
  return new Uint8Array(Buffer.alloc(bytes, fill))
}

export function octKey(bytes: number, fill: number, params: JWKCommonParams = {}): OctetSequenceKey {
  return OctetSequenceKeyBuilder.fromBytes(testSecret(bytes, fill)).commonParams(params).build()
}

function asRSA(key: JWK): RSAKey {
  if (key.kty !== 'RSA') throw new Error(`Expected an RSA key, got ${key.kty}`)
  return key
}

function asEC(key: JWK): ECKey {
  if (key.kty !== 'EC') throw new Error(`Expected an EC key, got ${key.kty}`)
  return key
}

const rsaPairs: KeyObject[] = []

/**
 * RSA-2048 private key. Generation is slow, so pairs are cached by index.
 */
export function rsaKey(params: JWKCommonParams = {}, index = 0): RSAKey {
  while (rsaPairs.length <= index) {
    rsaPairs.push(generateKeyPairSync('rsa', { modulusLength: 2048 }).privateKey)
  }
  return asRSA(jwkFromKeyObject(rsaPairs[index], params))
}

const ecPairs = new Map<string, KeyObject>()

/**
 * EC private key on a Node curve name (`prime256v1`, `secp384r1`, `secp521r1`).
 */
export function ecKey(namedCurve = 'prime256v1', params: JWKCommonParams = {}, index = 0): ECKey {
  const cacheKey = `${namedCurve}:${index}`
  let privateKey = ecPairs.get(cacheKey)
  if (!privateKey) {
    privateKey = generateKeyPairSync('ec', { namedCurve }).privateKey
    ecPairs.set(cacheKey, privateKey)
  }
  return asEC(jwkFromKeyObject(privateKey, params))
}
