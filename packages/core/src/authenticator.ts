// @latchkey/core — Message authenticator (HMAC-SHA256 signed messages)

import type { CryptoProvider } from './crypto-provider.js'
import { fromBase64Url, toBase64Url, utf8Decode, utf8Encode } from './encoding.js'
import type { TokenString } from './types.js'
import { MAC_SIZE } from './types.js'

/** base64url("HS256"), the only protected header latchkey emits or accepts */
export const PROTECTED_HEADER = toBase64Url(utf8Encode('HS256'))

/**
 * Dummy signing input for constant-time HMAC computation when the token
 * structure is already known to be bad.
 */
const DUMMY_SIGNING_INPUT = utf8Encode(`${PROTECTED_HEADER}.`)

/** Dummy MAC (32 bytes of zeros) used when the MAC segment does not decode */
const DUMMY_MAC = new Uint8Array(MAC_SIZE)

/**
 * Signs a message.
 *
 * Token wire format (three base64url segments, no padding):
 * ```
 * [ header ].[ message ].[ HMAC-SHA256(key, "header.message") ]
 * ```
 *
 * The message is readable by anyone holding the token; it is protected
 * against tampering, not disclosure.
 */
export async function signMessage(
  cryptoProvider: CryptoProvider,
  key: CryptoKey,
  message: string,
): Promise<TokenString> {
  const signingInput = `${PROTECTED_HEADER}.${toBase64Url(utf8Encode(message))}`
  const mac = await cryptoProvider.sign(key, utf8Encode(signingInput))
  return `${signingInput}.${toBase64Url(new Uint8Array(mac))}` as TokenString
}

/**
 * Verifies a signed message and returns it.
 *
 * All steps run regardless of which one fails, and the HMAC check always
 * runs (against dummy input when the structure is bad). Bad structure,
 * bad encoding and a wrong MAC all return the same `null`.
 *
 * @returns The message, or null if the token is not authentic
 */
export async function verifyMessage(
  cryptoProvider: CryptoProvider,
  key: CryptoKey,
  token: string,
): Promise<string | null> {
  let valid = true

  // Step 1: Structure (exactly three segments, known header)
  const segments = token.split('.')
  const [header = '', messageSegment = '', macSegment = ''] = segments
  const structureOk = segments.length === 3 && header === PROTECTED_HEADER
  valid &&= structureOk

  // Step 2: Decode segments (canonical base64url only)
  const messageBytes = decodeSegment(messageSegment)
  const macBytes = decodeSegment(macSegment)
  const macOk = macBytes !== null && macBytes.byteLength === MAC_SIZE
  valid &&= messageBytes !== null && macOk

  // Step 3: HMAC verify (constant-time via crypto.subtle.verify)
  // MUST run even if earlier steps failed
  const signingInput = structureOk
    ? utf8Encode(`${header}.${messageSegment}`)
    : DUMMY_SIGNING_INPUT
  const signature = macOk ? macBytes : DUMMY_MAC
  const authentic = await cryptoProvider.verify(key, signature, signingInput)
  valid &&= authentic

  // Step 4: Message text
  const message = valid && messageBytes !== null ? decodeText(messageBytes) : null

  // Single exit point
  return valid ? message : null
}

function decodeSegment(segment: string): Uint8Array<ArrayBuffer> | null {
  try {
    return fromBase64Url(segment)
  } catch {
    return null
  }
}

function decodeText(bytes: Uint8Array): string | null {
  try {
    return utf8Decode(bytes)
  } catch {
    return null
  }
}
