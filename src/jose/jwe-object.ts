import { containsAlgorithm } from '../algorithms/algorithm'
import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { parseHeaderBase64Url } from '../header/header-parser'
import { Payload } from '../payload/payload'
import { base64UrlDecode, base64UrlEncode } from '../utils/encoding'

import { BaseJOSEObject, collaborate } from './base-jose-object'
import { expectPartCount, requireSegment, splitCompact } from './compact'
import { ensureJWEHeaderAccepted } from './header-filter'

import type { Header } from '../header/header-parser'
import type { JWEHeader } from '../header/jwe-header'
import type { JWEDecrypter, JWEEncrypter } from './collaborators'

export enum JWEObjectState {
  UNENCRYPTED = 'UNENCRYPTED',
  ENCRYPTED = 'ENCRYPTED',
  DECRYPTED = 'DECRYPTED',
}

interface EncryptedParts {
  /** Header segment authenticated as the additional data. */
  header: string
  encryptedKey: string
  iv: string
  cipherText: string
  authTag: string
}

/**
 * @summary Encrypted JOSE object: `UNENCRYPTED → ENCRYPTED → DECRYPTED`.
 * @remarks
 * Compact form has five segments: header, encrypted key, IV, cipher text and
 * authentication tag. The key, IV and tag segments may be empty. Decryption happens at
 * most once.
 */
export class JWEObject extends BaseJOSEObject<JWEHeader> {
  readonly kind = 'jwe' as const

  private jweHeader: JWEHeader
  private jwePayload?: Payload
  private encrypted?: EncryptedParts
  private currentState: JWEObjectState

  constructor(header: JWEHeader, payload: Payload)
  /** @internal Parsed form: no clear text yet. */
  constructor(header: JWEHeader, payload: undefined, parsedParts: readonly string[])
  constructor(header: JWEHeader, payload: Payload | undefined, parsedParts?: readonly string[]) {
    super(parsedParts)
    this.jweHeader = header
    this.jwePayload = payload
    this.currentState = JWEObjectState.UNENCRYPTED
  }

  /**
   * @summary Parse a compact JWE. The result is `ENCRYPTED`; nothing is checked yet.
   * @throws {@link JoseError} with code `PARSE_ERROR` when the string is not a JWE.
   */
  static parse(serialized: string): JWEObject {
    const parts = splitCompact(serialized)
    return JWEObject.fromParts(parts, parseHeaderBase64Url(parts[0]))
  }

  /** @internal */
  static fromParts(parts: readonly string[], header: Header): JWEObject {
    expectPartCount(parts, 5, 'JWE object')
    if (header.kind !== 'jwe') {
      throw parseError('The header is not a JWE header', 'alg')
    }
    const object = new JWEObject(header, undefined, parts)
    object.encrypted = {
      header: parts[0],
      encryptedKey: requireSegment(parts[1], 'encrypted key'),
      iv: requireSegment(parts[2], 'initialization vector'),
      cipherText: requireSegment(parts[3], 'cipher text'),
      authTag: requireSegment(parts[4], 'authentication tag'),
    }
    object.currentState = JWEObjectState.ENCRYPTED
    return object
  }

  get header(): JWEHeader {
    return this.jweHeader
  }

  /** Clear text; undefined while a parsed object is still encrypted. */
  get payload(): Payload | undefined {
    return this.jwePayload
  }

  get state(): JWEObjectState {
    return this.currentState
  }

  get encryptedKey(): string | undefined {
    return this.encrypted?.encryptedKey
  }

  get iv(): string | undefined {
    return this.encrypted?.iv
  }

  get cipherText(): string | undefined {
    return this.encrypted?.cipherText
  }

  get authTag(): string | undefined {
    return this.encrypted?.authTag
  }

  /**
   * @summary Encrypt the payload and move to `ENCRYPTED`.
   * @throws {@link JoseError} with code `INVALID_STATE` unless `UNENCRYPTED`,
   * `UNSUPPORTED_ALG` when the encrypter lists neither the `alg` nor the `enc`, or
   * `ENCRYPT_FAILED` when the encrypter fails.
   */
  encrypt(encrypter: JWEEncrypter): void {
    const payload = this.jwePayload
    if (this.currentState !== JWEObjectState.UNENCRYPTED || payload === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWE object must be in an unencrypted state')
    }
    if (!containsAlgorithm(encrypter.supportedAlgorithms, this.jweHeader.algorithm)) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALG,
        `The "${this.jweHeader.algorithm.name}" algorithm is not supported by the JWE encrypter`,
      )
    }
    if (!containsAlgorithm(encrypter.supportedEncryptionMethods, this.jweHeader.encryptionMethod)) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALG,
        `The "${this.jweHeader.encryptionMethod.name}" encryption method is not supported by the JWE encrypter`,
      )
    }
    const parts = collaborate(JoseErrorCode.ENCRYPT_FAILED, () =>
      encrypter.encrypt(this.jweHeader, payload.toBytes()),
    )
    if (parts.header) this.jweHeader = parts.header
    this.encrypted = {
      header: this.jweHeader.toBase64Url(),
      encryptedKey: parts.encryptedKey ? base64UrlEncode(parts.encryptedKey) : '',
      iv: parts.iv ? base64UrlEncode(parts.iv) : '',
      cipherText: base64UrlEncode(parts.cipherText),
      authTag: parts.authTag ? base64UrlEncode(parts.authTag) : '',
    }
    this.currentState = JWEObjectState.ENCRYPTED
  }

  /**
   * @summary Decrypt once and move to `DECRYPTED`, replacing the payload with the clear text.
   * @throws {@link JoseError} with code `INVALID_STATE` unless `ENCRYPTED`,
   * `ALG_NOT_ACCEPTED` or `PARAMS_NOT_ACCEPTED` from the decrypter's header filter,
   * `UNSUPPORTED_ALG`, or `DECRYPT_FAILED`.
   */
  decrypt(decrypter: JWEDecrypter): void {
    const encrypted = this.encrypted
    if (this.currentState !== JWEObjectState.ENCRYPTED || encrypted === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWE object must be in an encrypted state')
    }
    ensureJWEHeaderAccepted(decrypter.headerFilter, this.jweHeader)
    if (
      !containsAlgorithm(decrypter.supportedAlgorithms, this.jweHeader.algorithm) ||
      !containsAlgorithm(decrypter.supportedEncryptionMethods, this.jweHeader.encryptionMethod)
    ) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALG,
        `The "${this.jweHeader.algorithm.name}" / "${this.jweHeader.encryptionMethod.name}" combination is not supported by the JWE decrypter`,
      )
    }
    const clearText = collaborate(JoseErrorCode.DECRYPT_FAILED, () =>
      decrypter.decrypt(this.jweHeader, {
        encryptedKey: optionalBytes(encrypted.encryptedKey, 'encrypted key'),
        iv: optionalBytes(encrypted.iv, 'initialization vector'),
        cipherText: base64UrlDecode(encrypted.cipherText, 'cipher text'),
        authTag: optionalBytes(encrypted.authTag, 'authentication tag'),
      }),
    )
    this.jwePayload = Payload.fromBytes(clearText)
    this.currentState = JWEObjectState.DECRYPTED
  }

  /**
   * @summary Compact form, reusing the header segment fixed at encryption or parsing.
   * @throws {@link JoseError} with code `INVALID_STATE` unless encrypted or decrypted.
   */
  serialize(): string {
    const encrypted = this.encrypted
    if (this.currentState === JWEObjectState.UNENCRYPTED || encrypted === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWE object must be in an encrypted or decrypted state')
    }
    return [
      encrypted.header,
      encrypted.encryptedKey,
      encrypted.iv,
      encrypted.cipherText,
      encrypted.authTag,
    ].join('.')
  }
}

function optionalBytes(segment: string, name: string): Uint8Array | undefined {
  return segment === '' ? undefined : base64UrlDecode(segment, name)
}
