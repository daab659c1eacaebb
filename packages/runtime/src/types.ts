// @latchkey/runtime — Types and configuration interfaces

import type {
  CryptoProvider,
  KeyCache,
  KeySource,
  ResolvedKeyOptions,
  TokenData,
  TokenString,
  VerifyResult,
} from '@latchkey/core'
import type { LogLevel, LogSink } from './log.js'

// ============================================================
// User Records (owned by the embedding application)
// ============================================================

export type UserId = string | number

/**
 * The fields latchkey reads from a user record. Records may carry any
 * other fields; the ones listed in `dropUserKeys` are removed before a
 * record is handed back.
 */
export interface UserRecord {
  readonly id: UserId
  /** Set once the account has been confirmed */
  readonly confirmedAt?: Date | string | null | undefined
  /** Set when a password reset was requested */
  readonly resetSentAt?: Date | string | null | undefined
}

/** A user record with the sensitive fields removed */
export type PublicUser = Readonly<Record<string, unknown>>

/**
 * User lookup supplied by the embedding application.
 * Receives the data decoded from the token.
 */
export interface UserContext {
  getBy(
    attrs: TokenData,
  ): UserRecord | null | undefined | Promise<UserRecord | null | undefined>
}

/** Caller-facing messages. Internal failure reasons only go to the log. */
export interface UserMessages {
  readonly defaultError: string
  readonly alreadyConfirmed: string
}

// ============================================================
// Latchkey Configuration
// ============================================================

/**
 * Main configuration for latchkey. Built once at process start and passed
 * to `createLatchkey`.
 *
 * @example
 * ```typescript
 * const latchkey = createLatchkey({
 *   keySource: { kind: 'endpoint', endpoint: appEndpoint },
 *   tokenSalt: 'account-tokens',
 *   userContext: users,
 * })
 * ```
 */
export interface LatchkeyConfig {
  // ---- Tokens ----

  /** Default key source for every call */
  readonly keySource: KeySource

  /** Default salt for key derivation */
  readonly tokenSalt: string

  /** PBKDF2 iterations (default: 1000) */
  readonly keyIterations?: number | undefined

  /** Derived key length in bytes (default: 32, minimum 20) */
  readonly keyLength?: number | undefined

  /** 'sha256' or 'sha512' (default: 'sha256') */
  readonly keyDigest?: string | undefined

  /**
   * Derived-key cache. `true` (default) creates one for this instance,
   * `false` derives on every call.
   */
  readonly keyCache?: boolean | KeyCache | undefined

  // ---- Users ----

  /** User lookup */
  readonly userContext: UserContext

  /** Fields removed from user records before they are returned (default: password, passwordHash) */
  readonly dropUserKeys?: readonly string[] | undefined

  /** Overrides for the caller-facing messages */
  readonly userMessages?: Partial<UserMessages> | undefined

  // ---- Logging ----

  /** Lowest level written (default: 'info'); false disables logging */
  readonly logLevel?: LogLevel | undefined

  /** Where log entries go (default: winston JSON logger on the console) */
  readonly logSink?: LogSink | undefined

  // ---- Provider Override ----

  /** Custom CryptoProvider implementation (default: WebCryptoCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined
}

// ============================================================
// Resolved Configuration (defaults applied)
// ============================================================

/**
 * Fully resolved configuration with all defaults applied.
 * Exposed as `latchkey.config` on a LatchkeyInstance.
 */
export interface ResolvedLatchkeyConfig {
  readonly tokenSalt: string
  readonly keyOptions: ResolvedKeyOptions
  readonly dropUserKeys: readonly string[]
  readonly userMessages: UserMessages
  readonly logLevel: LogLevel
}

// ============================================================
// Per-call Options
// ============================================================

/** Overrides for a single sign / verify call */
export interface TokenCallOptions {
  readonly keySource?: KeySource | undefined
  readonly salt?: string | undefined
  readonly iterations?: number | undefined
  readonly keyLength?: number | undefined
  readonly digest?: string | undefined
  /** Token lifetime in seconds; only used when signing */
  readonly maxAge?: number | undefined
  /** Current time override (unix seconds) for testing */
  readonly now?: number | undefined
}

/** Options for the confirmation and authentication workflows */
export interface WorkflowOptions extends TokenCallOptions {
  /** Overrides the configured user lookup */
  readonly userContext?: UserContext | undefined
  /** Extra metadata attached to every log entry */
  readonly logMeta?: Readonly<Record<string, unknown>> | undefined
}

/** Request parameters for a confirmation. Must contain `key`. */
export type ConfirmParams = Readonly<Record<string, unknown>>

// ============================================================
// Results
// ============================================================

/** Outcome of a confirmation or authentication */
export type WorkflowResult =
  | { readonly ok: true; readonly user: PublicUser }
  | { readonly ok: false; readonly error: string }

// ============================================================
// Latchkey Instance (Orchestration Core)
// ============================================================

/**
 * The latchkey runtime instance.
 *
 * Created by `createLatchkey(config)`. Holds the resolved configuration,
 * the crypto provider and the key cache.
 */
export interface LatchkeyInstance {
  /** Sign data into a token (default lifetime: 4 hours) */
  sign(data: TokenData, options?: TokenCallOptions): Promise<TokenString>

  /** Verify a token and return its data */
  verify(token: unknown, options?: TokenCallOptions): Promise<VerifyResult>

  /** Sign a token for the confirmation workflows (lifetime: 20 minutes) */
  signConfirmationToken(data: TokenData, options?: TokenCallOptions): Promise<TokenString>

  /** Confirm an account; fails if it is already confirmed */
  confirm(params: ConfirmParams, options?: WorkflowOptions): Promise<WorkflowResult>

  /** Authorize a password reset; fails if no reset was requested */
  confirmPasswordReset(params: ConfirmParams, options?: WorkflowOptions): Promise<WorkflowResult>

  /** Run the confirmation workflow with a custom guard */
  confirmWith(
    guard: ConfirmationGuard,
    params: ConfirmParams,
    options?: WorkflowOptions,
  ): Promise<WorkflowResult>

  /** Resolve the user a token was issued for */
  authenticate(token: unknown, options?: WorkflowOptions): Promise<WorkflowResult>

  /** Resolved configuration (readonly) */
  readonly config: ResolvedLatchkeyConfig
}

// ============================================================
// Confirmation Guards
// ============================================================

/** Which caller-facing message a rejected confirmation returns */
export type GuardReply = keyof UserMessages

/** Decision of a guard about a resolved user */
export type GuardVerdict =
  | { readonly pass: true; readonly message: string }
  | {
      readonly pass: false
      readonly message: string
      readonly reply: GuardReply
      /** Whether the log entry names the user (default: true) */
      readonly logUser?: boolean | undefined
    }

/**
 * The one step that differs between confirmation variants.
 * `message` is what gets logged; `reply` picks the caller-facing message.
 */
export interface ConfirmationGuard {
  readonly name: string
  check(user: UserRecord): GuardVerdict
}

// ============================================================
// Default Constants
// ============================================================

/** Lifetime of confirmation tokens in seconds (20 minutes) */
export const CONFIRM_MAX_AGE_SECONDS = 20 * 60

/** Default fields removed from returned user records */
export const DEFAULT_DROP_USER_KEYS: readonly string[] = ['password', 'passwordHash']

/** Default caller-facing messages */
export const DEFAULT_USER_MESSAGES: UserMessages = {
  defaultError: 'Invalid credentials',
  alreadyConfirmed: 'Your account has already been confirmed',
}
