// @latchkey/core — PBKDF2 key derivation with option validation

import type { CryptoProvider } from './crypto-provider.js'
import { ConfigurationError } from './errors.js'
import { utf8Encode } from './encoding.js'
import { type KeyCache, keyCacheId } from './key-cache.js'
import type { KeyDerivationOptions, KeyDigest, ResolvedKeyOptions } from './types.js'
import {
  DEFAULT_KEY_DIGEST,
  DEFAULT_KEY_ITERATIONS,
  DEFAULT_KEY_LENGTH,
  MIN_KEY_LENGTH,
  SUPPORTED_DIGESTS,
} from './types.js'

function isKeyDigest(value: string): value is KeyDigest {
  return SUPPORTED_DIGESTS.some((digest) => digest === value)
}

/**
 * Applies defaults to key generator options and validates them.
 *
 * @throws {ConfigurationError} On a key length under 20 bytes, a
 *   non-positive or fractional iteration count, or an unsupported digest
 */
export function resolveKeyOptions(options: KeyDerivationOptions): ResolvedKeyOptions {
  const iterations = options.iterations ?? DEFAULT_KEY_ITERATIONS
  if (!Number.isSafeInteger(iterations) || iterations < 1) {
    throw new ConfigurationError(
      `The key iterations must be a positive integer, got ${String(iterations)}.`,
    )
  }

  const keyLength = options.keyLength ?? DEFAULT_KEY_LENGTH
  if (!Number.isSafeInteger(keyLength) || keyLength < MIN_KEY_LENGTH) {
    throw new ConfigurationError(
      `The key length is too short. It should be at least ${String(MIN_KEY_LENGTH)} bytes long.`,
    )
  }

  const digest = options.digest ?? DEFAULT_KEY_DIGEST
  if (!isKeyDigest(digest)) {
    throw new ConfigurationError(`Unsupported key digest: ${digest}`)
  }

  return { salt: options.salt, iterations, keyLength, digest }
}

/**
 * Derives the token signing key.
 *
 * Key derivation path:
 * ```
 * PBKDF2(secret, salt, iterations, keyLength, digest) -> HMAC-SHA256 key
 * ```
 *
 * Deterministic: the same secret and options always give the same key.
 * With a cache, repeated derivations of one tuple share a single promise.
 *
 * @param cryptoProvider - CryptoProvider for PBKDF2
 * @param secret - Validated secret key base
 * @param options - Resolved key options
 * @param cache - Optional derived-key cache
 */
export async function deriveTokenKey(
  cryptoProvider: CryptoProvider,
  secret: string,
  options: ResolvedKeyOptions,
  cache?: KeyCache,
): Promise<CryptoKey> {
  const derive = (): Promise<CryptoKey> =>
    cryptoProvider.deriveKey(utf8Encode(secret), utf8Encode(options.salt), {
      iterations: options.iterations,
      length: options.keyLength,
      digest: options.digest,
    })

  if (cache === undefined) {
    return derive()
  }

  const id = keyCacheId(secret, options.salt, options.iterations, options.keyLength, options.digest)
  const cached = cache.get(id)
  if (cached !== undefined) {
    return cached
  }

  const pending = derive()
  cache.set(id, pending)
  return pending
}
