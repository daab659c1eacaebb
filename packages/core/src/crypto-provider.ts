// @latchkey/core — CryptoProvider abstraction

import type { KeyDigest } from './types.js'

/** Parameters for PBKDF2 key derivation */
export interface DeriveKeyParams {
  /** Iteration count (>= 1) */
  readonly iterations: number
  /** Output length in bytes */
  readonly length: number
  /** PRF digest */
  readonly digest: KeyDigest
}

/**
 * CryptoProvider abstraction for all cryptographic operations.
 *
 * All crypto operations in latchkey go through this interface;
 * never call `crypto.subtle` directly from token code.
 *
 * Default implementation: WebCryptoCryptoProvider.
 */
export interface CryptoProvider {
  /**
   * Signs data with HMAC-SHA256.
   * Returns the full 256-bit MAC (NO truncation).
   */
  sign(key: CryptoKey, data: Uint8Array<ArrayBuffer>): Promise<ArrayBuffer>

  /**
   * Verifies an HMAC-SHA256 signature.
   * MUST be constant-time (crypto.subtle.verify is inherently constant-time).
   */
  verify(
    key: CryptoKey,
    signature: Uint8Array<ArrayBuffer>,
    data: Uint8Array<ArrayBuffer>,
  ): Promise<boolean>

  /**
   * Stretches a secret into an HMAC-SHA256 signing key with PBKDF2.
   *
   * @param secret - Secret key base as raw bytes
   * @param salt - Token salt as raw bytes
   */
  deriveKey(
    secret: Uint8Array<ArrayBuffer>,
    salt: Uint8Array<ArrayBuffer>,
    params: DeriveKeyParams,
  ): Promise<CryptoKey>
}
