// @latchkey/runtime — Core latchkey instance (orchestration layer)

import {
  ConfigurationError,
  WebCryptoCryptoProvider,
  createKeyCache,
  resolveKeyOptions,
  signToken,
  verifyToken,
} from '@latchkey/core'
import type {
  CryptoProvider,
  KeyCache,
  TokenData,
  TokenOptions,
  TokenString,
  VerifyResult,
} from '@latchkey/core'
import { authenticateToken } from './authenticate.js'
import { accountConfirmationGuard, passwordResetGuard, runConfirmation } from './confirm.js'
import type { ConfirmationDeps } from './confirm.js'
import { createDefaultLogger, createLevelFilter, createWinstonLogSink } from './log.js'
import type { LogLevel, LogSink } from './log.js'
import type {
  ConfirmParams,
  ConfirmationGuard,
  LatchkeyConfig,
  LatchkeyInstance,
  ResolvedLatchkeyConfig,
  TokenCallOptions,
  UserContext,
  WorkflowOptions,
  WorkflowResult,
} from './types.js'
import { CONFIRM_MAX_AGE_SECONDS, DEFAULT_DROP_USER_KEYS, DEFAULT_USER_MESSAGES } from './types.js'

// ============================================================
// Configuration Resolution
// ============================================================

const LOG_LEVELS: readonly LogLevel[] = ['info', 'warn', false]

function isUserContext(value: unknown): value is UserContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getBy' in value &&
    typeof value.getBy === 'function'
  )
}

/**
 * Resolves user config with defaults applied.
 *
 * @throws {ConfigurationError} If the token salt or the user context is
 *   missing, the log level is unknown or the key derivation options are
 *   invalid
 */
export function resolveConfig(config: LatchkeyConfig): ResolvedLatchkeyConfig {
  if (typeof config.tokenSalt !== 'string' || config.tokenSalt.length === 0) {
    throw new ConfigurationError('The tokenSalt has not been set')
  }
  if (!isUserContext(config.userContext)) {
    throw new ConfigurationError('The userContext must provide a getBy function')
  }
  const logLevel = config.logLevel ?? 'info'
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigurationError(`Unsupported log level: ${String(logLevel)}`)
  }

  return {
    tokenSalt: config.tokenSalt,
    keyOptions: resolveKeyOptions({
      salt: config.tokenSalt,
      iterations: config.keyIterations,
      keyLength: config.keyLength,
      digest: config.keyDigest,
    }),
    dropUserKeys: config.dropUserKeys ?? DEFAULT_DROP_USER_KEYS,
    userMessages: { ...DEFAULT_USER_MESSAGES, ...config.userMessages },
    logLevel,
  }
}

function resolveKeyCache(option: LatchkeyConfig['keyCache']): KeyCache | undefined {
  if (option === undefined || option === true) return createKeyCache()
  if (option === false) return undefined
  return option
}

// ============================================================
// Latchkey Instance Factory
// ============================================================

/**
 * Creates a latchkey instance.
 *
 * This is the main entry point. It resolves the configuration once and
 * returns an instance that threads it through every sign, verify and
 * confirmation call.
 *
 * @example
 * ```typescript
 * const latchkey = createLatchkey({
 *   keySource: process.env.SECRET_KEY_BASE ?? '',
 *   tokenSalt: 'account-tokens',
 *   userContext: { getBy: (attrs) => users.findBy(attrs) },
 * })
 *
 * const token = await latchkey.signConfirmationToken({ email: user.email })
 * // ...later, from the link in the confirmation email
 * const result = await latchkey.confirm({ key: token })
 * ```
 *
 * @throws {ConfigurationError} On invalid configuration
 */
export function createLatchkey(config: LatchkeyConfig): LatchkeyInstance {
  const resolved = resolveConfig(config)
  const cryptoProvider: CryptoProvider = config.cryptoProvider ?? new WebCryptoCryptoProvider()
  const keyCache = resolveKeyCache(config.keyCache)
  const logSink: LogSink = createLevelFilter(
    config.logSink ?? createWinstonLogSink(createDefaultLogger(resolved.logLevel)),
    resolved.logLevel,
  )

  function tokenOptions(options: TokenCallOptions): TokenOptions {
    return {
      salt: options.salt ?? resolved.tokenSalt,
      iterations: options.iterations ?? resolved.keyOptions.iterations,
      keyLength: options.keyLength ?? resolved.keyOptions.keyLength,
      digest: options.digest ?? resolved.keyOptions.digest,
      maxAge: options.maxAge,
      now: options.now,
      keyCache,
    }
  }

  async function sign(data: TokenData, options: TokenCallOptions = {}): Promise<TokenString> {
    return signToken(cryptoProvider, options.keySource ?? config.keySource, data, tokenOptions(options))
  }

  async function verify(token: unknown, options: TokenCallOptions = {}): Promise<VerifyResult> {
    return verifyToken(
      cryptoProvider,
      options.keySource ?? config.keySource,
      token,
      tokenOptions(options),
    )
  }

  function workflowDeps(options: WorkflowOptions): ConfirmationDeps {
    return {
      verify,
      userContext: options.userContext ?? config.userContext,
      logSink,
      dropUserKeys: resolved.dropUserKeys,
      userMessages: resolved.userMessages,
      logMeta: options.logMeta ?? {},
    }
  }

  async function confirmWith(
    guard: ConfirmationGuard,
    params: ConfirmParams,
    options: WorkflowOptions = {},
  ): Promise<WorkflowResult> {
    return runConfirmation(workflowDeps(options), params, guard, options)
  }

  // ============================================================
  // Instance Methods
  // ============================================================

  const instance: LatchkeyInstance = {
    config: resolved,

    sign,

    verify,

    async signConfirmationToken(
      data: TokenData,
      options: TokenCallOptions = {},
    ): Promise<TokenString> {
      return sign(data, { ...options, maxAge: CONFIRM_MAX_AGE_SECONDS })
    },

    async confirm(params: ConfirmParams, options?: WorkflowOptions): Promise<WorkflowResult> {
      return confirmWith(accountConfirmationGuard, params, options)
    },

    async confirmPasswordReset(
      params: ConfirmParams,
      options?: WorkflowOptions,
    ): Promise<WorkflowResult> {
      return confirmWith(passwordResetGuard, params, options)
    },

    confirmWith,

    async authenticate(token: unknown, options: WorkflowOptions = {}): Promise<WorkflowResult> {
      return authenticateToken(workflowDeps(options), token, options)
    },
  }

  return instance
}
