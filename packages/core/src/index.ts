// @latchkey/core — Public API surface
// Signed, self-contained, time-bounded tokens

// ============================================================
// Types
// ============================================================

export type { CryptoProvider, DeriveKeyParams } from './crypto-provider.js'

export type {
  TokenString,
  TokenData,
  TokenPayload,
  JsonValue,
  JsonObject,
  KeyDigest,
  KeyDerivationOptions,
  ResolvedKeyOptions,
  VerifyError,
  VerifyResult,
  VerificationOutcome,
} from './types.js'

export type {
  KeySource,
  Endpoint,
  ConnectionKeySource,
  SocketKeySource,
  EndpointKeySource,
} from './key-source.js'

export type { KeyCache, KeyCacheConfig } from './key-cache.js'

export type { TokenOptions } from './token.js'

export type { LatchkeyErrorCode } from './errors.js'

// ============================================================
// Errors
// ============================================================

export { LatchkeyError, ConfigurationError, ContractViolationError } from './errors.js'

// ============================================================
// CryptoProvider
// ============================================================

export { WebCryptoCryptoProvider } from './web-crypto-provider.js'

// ============================================================
// Key Management
// ============================================================

export { resolveSecret, validateSecret } from './key-source.js'

export { resolveKeyOptions, deriveTokenKey } from './key-derivation.js'

export { createKeyCache, keyCacheId } from './key-cache.js'

// ============================================================
// Token Operations
// ============================================================

export { signToken, verifyToken, checkToken, describeOutcome, unixNow } from './token.js'

export { signMessage, verifyMessage, PROTECTED_HEADER } from './authenticator.js'

export { encodePayload, decodePayload } from './codec.js'

// ============================================================
// Constants
// ============================================================

export {
  SUPPORTED_DIGESTS,
  INVALID_TOKEN,
  EXPIRED_TOKEN,
  DEFAULT_MAX_AGE_SECONDS,
  MIN_SECRET_BYTES,
  MIN_KEY_LENGTH,
  DEFAULT_KEY_LENGTH,
  DEFAULT_KEY_ITERATIONS,
  DEFAULT_KEY_DIGEST,
  DEFAULT_KEY_CACHE_MAX,
  MAC_SIZE,
} from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export { toBase64Url, fromBase64Url, utf8Encode, utf8Decode } from './encoding.js'
