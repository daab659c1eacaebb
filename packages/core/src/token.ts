// @latchkey/core — Token service: sign / verify

import { signMessage, verifyMessage } from './authenticator.js'
import { decodePayload, encodePayload } from './codec.js'
import type { CryptoProvider } from './crypto-provider.js'
import type { KeyCache } from './key-cache.js'
import { deriveTokenKey, resolveKeyOptions } from './key-derivation.js'
import { type KeySource, resolveSecret } from './key-source.js'
import type {
  KeyDerivationOptions,
  TokenData,
  TokenString,
  VerificationOutcome,
  VerifyResult,
} from './types.js'
import { DEFAULT_MAX_AGE_SECONDS, EXPIRED_TOKEN, INVALID_TOKEN } from './types.js'

/**
 * Options for `signToken` and `verifyToken`.
 *
 * The key derivation fields must match between signing and verifying;
 * a mismatch is indistinguishable from tampering.
 */
export interface TokenOptions extends KeyDerivationOptions {
  /**
   * Seconds the token stays valid (default: 14400 = 4 hours).
   * Only used when signing; verification relies on the signed expiry.
   */
  readonly maxAge?: number | undefined
  /** Derived-key cache shared between calls */
  readonly keyCache?: KeyCache | undefined
  /** Current time override (unix seconds) for testing */
  readonly now?: number | undefined
}

/** Current unix time in whole seconds */
export function unixNow(): number {
  return Math.floor(Date.now() / 1000)
}

/**
 * Signs data into a token.
 *
 * Steps:
 * 1. Resolve the key source to a secret (>= 20 bytes)
 * 2. Derive the signing key with PBKDF2
 * 3. Build the payload `{ data, exp: now + maxAge }`
 * 4. Serialize it as canonical JSON
 * 5. Sign with HMAC-SHA256
 *
 * @throws {ConfigurationError} On an unresolvable or weak secret, or
 *   invalid key options. Never fails for well-formed input otherwise.
 */
export async function signToken(
  cryptoProvider: CryptoProvider,
  keySource: KeySource,
  data: TokenData,
  options: TokenOptions,
): Promise<TokenString> {
  const key = await tokenKey(cryptoProvider, keySource, options)
  const exp = (options.now ?? unixNow()) + (options.maxAge ?? DEFAULT_MAX_AGE_SECONDS)
  return signMessage(cryptoProvider, key, encodePayload({ data, exp }))
}

/**
 * Verifies a token and returns its data.
 *
 * - Not a string: `invalid token`, without resolving the secret or
 *   deriving a key
 * - Not authentic, or payload not decodable: `invalid token`
 * - Authentic but `exp < now`: `expired token`
 *
 * @throws {ConfigurationError} On an unresolvable or weak secret, or
 *   invalid key options
 */
export async function verifyToken(
  cryptoProvider: CryptoProvider,
  keySource: KeySource,
  token: unknown,
  options: TokenOptions,
): Promise<VerifyResult> {
  if (typeof token !== 'string') {
    return { ok: false, error: INVALID_TOKEN }
  }

  const key = await tokenKey(cryptoProvider, keySource, options)
  const outcome = await checkToken(cryptoProvider, key, token, options.now ?? unixNow())
  return describeOutcome(outcome)
}

/**
 * Runs the authenticator, the codec and the expiry check, keeping the
 * reason for failure.
 */
export async function checkToken(
  cryptoProvider: CryptoProvider,
  key: CryptoKey,
  token: string,
  now: number,
): Promise<VerificationOutcome> {
  const message = await verifyMessage(cryptoProvider, key, token)
  if (message === null) {
    return { kind: 'key-mismatch' }
  }

  const payload = decodePayload(message)
  if (payload === null) {
    return { kind: 'malformed' }
  }

  if (payload.exp < now) {
    return { kind: 'expired' }
  }
  return { kind: 'ok', data: payload.data }
}

/**
 * Collapses a verification outcome to the public result. Malformed and
 * key-mismatch outcomes share one message.
 */
export function describeOutcome(outcome: VerificationOutcome): VerifyResult {
  switch (outcome.kind) {
    case 'ok':
      return { ok: true, data: outcome.data }
    case 'expired':
      return { ok: false, error: EXPIRED_TOKEN }
    case 'malformed':
    case 'key-mismatch':
      return { ok: false, error: INVALID_TOKEN }
  }
}

async function tokenKey(
  cryptoProvider: CryptoProvider,
  keySource: KeySource,
  options: TokenOptions,
): Promise<CryptoKey> {
  const secret = resolveSecret(keySource)
  const keyOptions = resolveKeyOptions(options)
  return deriveTokenKey(cryptoProvider, secret, keyOptions, options.keyCache)
}
