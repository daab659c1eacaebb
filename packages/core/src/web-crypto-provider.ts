// @latchkey/core — WebCrypto-based CryptoProvider implementation

import type { CryptoProvider, DeriveKeyParams } from './crypto-provider.js'
import type { KeyDigest } from './types.js'

/** WebCrypto hash names for the supported digests */
const WEBCRYPTO_HASH: Readonly<Record<KeyDigest, string>> = {
  sha256: 'SHA-256',
  sha512: 'SHA-512',
}

/**
 * Default CryptoProvider implementation using the WebCrypto API.
 *
 * - HMAC-SHA256 for sign/verify (full 256-bit, NO truncation)
 * - PBKDF2 (SHA-256 or SHA-512) for key derivation
 *
 * Zero external dependencies. Uses the `crypto` global of Node 20.
 */
export class WebCryptoCryptoProvider implements CryptoProvider {
  async sign(key: CryptoKey, data: Uint8Array<ArrayBuffer>): Promise<ArrayBuffer> {
    return crypto.subtle.sign('HMAC', key, data)
  }

  /**
   * Verifies an HMAC-SHA256 signature using WebCrypto.
   * Inherently constant-time via crypto.subtle.verify.
   */
  async verify(
    key: CryptoKey,
    signature: Uint8Array<ArrayBuffer>,
    data: Uint8Array<ArrayBuffer>,
  ): Promise<boolean> {
    return crypto.subtle.verify('HMAC', key, signature, data)
  }

  /**
   * PBKDF2 with:
   * - Hash: params.digest
   * - Salt: raw salt bytes
   * - Output: params.length bytes, imported as a non-extractable
   *   HMAC-SHA256 key
   */
  async deriveKey(
    secret: Uint8Array<ArrayBuffer>,
    salt: Uint8Array<ArrayBuffer>,
    params: DeriveKeyParams,
  ): Promise<CryptoKey> {
    const baseKey = await crypto.subtle.importKey('raw', secret, { name: 'PBKDF2' }, false, [
      'deriveBits',
    ])

    const bits = await crypto.subtle.deriveBits(
      {
        name: 'PBKDF2',
        hash: WEBCRYPTO_HASH[params.digest],
        salt,
        iterations: params.iterations,
      },
      baseKey,
      params.length * 8,
    )

    return crypto.subtle.importKey('raw', bits, { name: 'HMAC', hash: 'SHA-256' }, false, [
      'sign',
      'verify',
    ])
  }
}
