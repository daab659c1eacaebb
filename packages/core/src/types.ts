// @latchkey/core — Types, constants, and branded types

// ============================================================
// Branded Types
// ============================================================

declare const TOKEN_BRAND: unique symbol

/** Branded string type for signed tokens */
export type TokenString = string & { readonly [TOKEN_BRAND]: 'LatchkeyToken' }

// ============================================================
// Token Data
// ============================================================

/** Any value that survives a JSON round trip unchanged */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }

/** A JSON object (string keys, JSON values) */
export type JsonObject = { readonly [key: string]: JsonValue }

/**
 * Data carried by a token: a user identifier (string or integer)
 * or a map of user attributes.
 */
export type TokenData = string | number | JsonObject

/** Payload that is serialized and signed */
export interface TokenPayload {
  readonly data: TokenData
  /** Expiry as unix seconds */
  readonly exp: number
}

// ============================================================
// Key Derivation
// ============================================================

/** Digests accepted by the key derivation function */
export const SUPPORTED_DIGESTS = ['sha256', 'sha512'] as const

export type KeyDigest = (typeof SUPPORTED_DIGESTS)[number]

/**
 * Key generator options. The same values must be used to sign and to
 * verify a token.
 */
export interface KeyDerivationOptions {
  /** Token salt. Defaults to the configured salt at the runtime layer. */
  readonly salt: string
  /** PBKDF2 iterations (default: 1000) */
  readonly iterations?: number | undefined
  /** Derived key length in bytes (default: 32, minimum: 20) */
  readonly keyLength?: number | undefined
  /** One of `SUPPORTED_DIGESTS` (default: 'sha256') */
  readonly digest?: string | undefined
}

/** Key derivation options with defaults applied and validated */
export interface ResolvedKeyOptions {
  readonly salt: string
  readonly iterations: number
  readonly keyLength: number
  readonly digest: KeyDigest
}

// ============================================================
// Result Types (never throw for verification)
// ============================================================

/** Message returned when a token cannot be authenticated or decoded */
export const INVALID_TOKEN = 'invalid token'

/** Message returned when a token authenticated but its expiry has passed */
export const EXPIRED_TOKEN = 'expired token'

export type VerifyError = typeof INVALID_TOKEN | typeof EXPIRED_TOKEN

/** Public verification result */
export type VerifyResult =
  | { readonly ok: true; readonly data: TokenData }
  | { readonly ok: false; readonly error: VerifyError }

/**
 * Internal verification outcome. Collapsed to `VerifyResult` at the
 * token service boundary; callers never see which failure occurred
 * beyond expired / invalid.
 */
export type VerificationOutcome =
  | { readonly kind: 'ok'; readonly data: TokenData }
  | { readonly kind: 'expired' }
  | { readonly kind: 'malformed' }
  | { readonly kind: 'key-mismatch' }

// ============================================================
// Default Configuration Constants
// ============================================================

/** Default token lifetime in seconds (4 hours) */
export const DEFAULT_MAX_AGE_SECONDS = 4 * 60 * 60

/** Minimum secret length in bytes */
export const MIN_SECRET_BYTES = 20

/** Minimum derived key length in bytes */
export const MIN_KEY_LENGTH = 20

/** Default derived key length in bytes */
export const DEFAULT_KEY_LENGTH = 32

/** Default PBKDF2 iteration count */
export const DEFAULT_KEY_ITERATIONS = 1000

/** Default PBKDF2 digest */
export const DEFAULT_KEY_DIGEST: KeyDigest = 'sha256'

/** Default capacity of the derived-key cache */
export const DEFAULT_KEY_CACHE_MAX = 64

/** MAC size in bytes (HMAC-SHA256, full 256-bit, NO truncation) */
export const MAC_SIZE = 32
