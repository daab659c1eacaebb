// @latchkey/core — Fatal error hierarchy
//
// Recoverable failures (bad token, expired token, unknown user) are result
// values and never thrown. Only deployment and integration bugs raise.

export type LatchkeyErrorCode = 'configuration_error' | 'contract_violation'

/**
 * Base class for errors that indicate a bug in the embedding application
 * rather than bad input from a client.
 */
export class LatchkeyError extends Error {
  public readonly code: LatchkeyErrorCode

  constructor(code: LatchkeyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LatchkeyError'
    this.code = code
  }
}

/**
 * Missing or weak secret, unresolved endpoint, unsupported digest,
 * invalid key options.
 */
export class ConfigurationError extends LatchkeyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration_error', message, options)
    this.name = 'ConfigurationError'
  }
}

/** The caller broke the calling contract (e.g. no `key` in confirmation params). */
export class ContractViolationError extends LatchkeyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('contract_violation', message, options)
    this.name = 'ContractViolationError'
  }
}
