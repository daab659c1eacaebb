// @latchkey/core — Encoding utilities (base64url, UTF-8)

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/

const encoder = new TextEncoder()
const strictDecoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Encodes a Uint8Array to base64url string (RFC 4648, no padding).
 * Pure function, zero dependencies.
 */
export function toBase64Url(buffer: Uint8Array): string {
  let binary = ''
  for (const byte of buffer) {
    binary += String.fromCharCode(byte)
  }
  const base64 = btoa(binary)
  return base64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '')
}

/**
 * Decodes a base64url string (RFC 4648, no padding) to Uint8Array.
 *
 * Only the canonical spelling is accepted: no padding, no whitespace, no
 * standard-alphabet characters, and no non-zero trailing bits. Every byte
 * string therefore has exactly one accepted encoding.
 *
 * @throws {Error} If the input is not canonical base64url
 */
export function fromBase64Url(encoded: string): Uint8Array<ArrayBuffer> {
  if (!BASE64URL_PATTERN.test(encoded) || encoded.length % 4 === 1) {
    throw new Error('Invalid base64url input')
  }

  // Restore standard base64 characters
  let base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')

  // Add padding
  const padLength = (4 - (base64.length % 4)) % 4
  base64 += '='.repeat(padLength)

  const binary = atob(base64)
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }

  if (toBase64Url(bytes) !== encoded) {
    throw new Error('Non-canonical base64url input')
  }
  return bytes
}

/** UTF-8 encodes a string. */
export function utf8Encode(text: string): Uint8Array<ArrayBuffer> {
  return encoder.encode(text)
}

/**
 * Decodes UTF-8 bytes to a string.
 *
 * @throws {TypeError} If the bytes are not valid UTF-8
 */
export function utf8Decode(bytes: Uint8Array): string {
  return strictDecoder.decode(bytes)
}
