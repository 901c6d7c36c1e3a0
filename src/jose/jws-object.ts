import { containsAlgorithm } from '../algorithms/algorithm'
import { JoseError, JoseErrorCode, parseError } from '../errors/jose.error'
import { parseHeaderBase64Url } from '../header/header-parser'
import { Payload } from '../payload/payload'
import { base64UrlDecode, base64UrlEncode, toUtf8Bytes } from '../utils/encoding'

import { BaseJOSEObject, collaborate } from './base-jose-object'
import { expectPartCount, requireSegment, splitCompact } from './compact'
import { ensureJWSHeaderAccepted } from './header-filter'

import type { Header } from '../header/header-parser'
import type { JWSHeader } from '../header/jws-header'
import type { JWSSigner, JWSVerifier } from './collaborators'

export enum JWSObjectState {
  UNSIGNED = 'UNSIGNED',
  SIGNED = 'SIGNED',
  VALIDATED = 'VALIDATED',
}

export interface JWSSerializeOptions {
  /** Leave the payload segment empty (RFC 7515 Appendix F). */
  detachedPayload?: boolean
}

/**
 * @summary Signed JOSE object: `UNSIGNED → SIGNED → VALIDATED`.
 * @remarks
 * The signing input is fixed at construction. For a parsed object it is taken from the
 * original header and payload segments, never re-encoded. Only `validate` is repeatable.
 */
export class JWSObject extends BaseJOSEObject<JWSHeader> {
  readonly kind = 'jws' as const

  private readonly jwsHeader: JWSHeader
  private readonly jwsPayload: Payload
  private readonly headerSegment: string
  private readonly signingInputBytes: Uint8Array
  private signatureSegment?: string
  private currentState: JWSObjectState

  /**
   * @throws {@link JoseError} with code `INVALID_ARGUMENT` when an unencoded (`b64: false`)
   * payload contains a period.
   */
  constructor(header: JWSHeader, payload: Payload, parsedParts?: readonly string[]) {
    super(parsedParts)
    this.jwsHeader = header
    this.jwsPayload = payload
    this.headerSegment = parsedParts?.[0] ?? header.toBase64Url()
    const payloadSegment = JWSObject.payloadSegment(header, payload)
    this.signingInputBytes = toUtf8Bytes(`${this.headerSegment}.${payloadSegment}`)
    this.currentState = JWSObjectState.UNSIGNED
  }

  /**
   * @summary Parse a compact JWS. The result is `SIGNED`; nothing is verified yet.
   * @throws {@link JoseError} with code `PARSE_ERROR` when the string is not a JWS.
   */
  static parse(serialized: string): JWSObject {
    const parts = splitCompact(serialized)
    return JWSObject.fromParts(parts, parseHeaderBase64Url(parts[0]))
  }

  /**
   * @summary Parse a compact JWS whose payload segment was detached.
   * @throws {@link JoseError} with code `PARSE_ERROR` when the payload segment is not empty.
   */
  static parseDetached(serialized: string, payload: Payload): JWSObject {
    const parts = splitCompact(serialized)
    expectPartCount(parts, 3, 'JWS object')
    if (parts[1] !== '') {
      throw parseError('The payload part of a detached JWS must be empty')
    }
    const header = parseHeaderBase64Url(parts[0])
    return JWSObject.fromParts([parts[0], JWSObject.payloadSegment(requireJWSHeader(header), payload), parts[2]], header)
  }

  /** @internal */
  static fromParts(parts: readonly string[], header: Header): JWSObject {
    expectPartCount(parts, 3, 'JWS object')
    const jwsHeader = requireJWSHeader(header)
    const payload = jwsHeader.base64UrlEncodePayload ? Payload.fromBase64Url(parts[1]) : Payload.fromString(parts[1])
    const object = new JWSObject(jwsHeader, payload, parts)
    object.signatureSegment = requireSegment(parts[2], 'signature')
    object.currentState = JWSObjectState.SIGNED
    return object
  }

  private static payloadSegment(header: JWSHeader, payload: Payload): string {
    if (header.base64UrlEncodePayload) return payload.toBase64Url()
    const text = payload.toString()
    if (text.includes('.')) {
      throw new JoseError(
        JoseErrorCode.INVALID_ARGUMENT,
        'An unencoded JWS payload must not contain a period',
      )
    }
    return text
  }

  get header(): JWSHeader {
    return this.jwsHeader
  }

  get payload(): Payload {
    return this.jwsPayload
  }

  get state(): JWSObjectState {
    return this.currentState
  }

  /** The base64url signature, once signed. */
  get signature(): string | undefined {
    return this.signatureSegment
  }

  /** Copy of the exact bytes signed and verified. */
  get signingInput(): Uint8Array {
    return new Uint8Array(this.signingInputBytes)
  }

  /**
   * @summary Sign with the given signer and move to `SIGNED`.
   * @throws {@link JoseError} with code `INVALID_STATE` unless `UNSIGNED`,
   * `UNSUPPORTED_ALG` when the signer doesn't list the header's algorithm, or
   * `SIGN_VERIFY_FAILED` when the signer fails.
   */
  sign(signer: JWSSigner): void {
    if (this.currentState !== JWSObjectState.UNSIGNED) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWS object must be in an unsigned state')
    }
    if (!containsAlgorithm(signer.supportedAlgorithms, this.jwsHeader.algorithm)) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALG,
        `The "${this.jwsHeader.algorithm.name}" algorithm is not supported by the JWS signer`,
      )
    }
    const signature = collaborate(JoseErrorCode.SIGN_VERIFY_FAILED, () =>
      signer.sign(this.jwsHeader, this.signingInput),
    )
    this.signatureSegment = base64UrlEncode(signature)
    this.currentState = JWSObjectState.SIGNED
  }

  /**
   * @summary Check the signature; `true` moves the object to `VALIDATED`.
   * @returns `false` for a wrong signature, without changing state.
   * @throws {@link JoseError} with code `INVALID_STATE` when `UNSIGNED`, `ALG_NOT_ACCEPTED`
   * or `PARAMS_NOT_ACCEPTED` from the verifier's header filter, `UNSUPPORTED_ALG`, or
   * `SIGN_VERIFY_FAILED` when the verifier fails.
   */
  validate(verifier: JWSVerifier): boolean {
    const signatureSegment = this.signatureSegment
    if (this.currentState === JWSObjectState.UNSIGNED || signatureSegment === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWS object must be in a signed or validated state')
    }
    ensureJWSHeaderAccepted(verifier.headerFilter, this.jwsHeader)
    if (!containsAlgorithm(verifier.supportedAlgorithms, this.jwsHeader.algorithm)) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALG,
        `The "${this.jwsHeader.algorithm.name}" algorithm is not supported by the JWS verifier`,
      )
    }
    const valid = collaborate(JoseErrorCode.SIGN_VERIFY_FAILED, () =>
      verifier.verify(this.jwsHeader, this.signingInput, base64UrlDecode(signatureSegment, 'signature')),
    )
    if (valid) this.currentState = JWSObjectState.VALIDATED
    return valid
  }

  /**
   * @summary Compact form, reusing the header segment that was signed.
   * @throws {@link JoseError} with code `INVALID_STATE` unless signed or validated.
   */
  serialize(options: JWSSerializeOptions = {}): string {
    if (this.currentState === JWSObjectState.UNSIGNED || this.signatureSegment === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_STATE, 'The JWS object must be in a signed or validated state')
    }
    const payloadSegment = options.detachedPayload ? '' : JWSObject.payloadSegment(this.jwsHeader, this.jwsPayload)
    return `${this.headerSegment}.${payloadSegment}.${this.signatureSegment}`
  }
}

function requireJWSHeader(header: Header): JWSHeader {
  if (header.kind !== 'jws') {
    throw parseError('The header is not a JWS header', 'alg')
  }
  return header
}
