// @latchkey/runtime — Public API surface
// Configuration, logging and the confirmation workflows

// ============================================================
// Types
// ============================================================

export type {
  LatchkeyConfig,
  ResolvedLatchkeyConfig,
  LatchkeyInstance,
  TokenCallOptions,
  WorkflowOptions,
  WorkflowResult,
  ConfirmParams,
  ConfirmationGuard,
  GuardVerdict,
  GuardReply,
  UserId,
  UserRecord,
  PublicUser,
  UserContext,
  UserMessages,
} from './types.js'

export type { LogEntry, LogLevel, LogSink } from './log.js'

export type { ConfirmationDeps, ConfirmationState } from './confirm.js'

export type { AuthenticationDeps } from './authenticate.js'

export type { ReportContext } from './report.js'

// ============================================================
// Latchkey Instance
// ============================================================

export { createLatchkey, resolveConfig } from './latchkey.js'

// ============================================================
// Workflows
// ============================================================

export {
  runConfirmation,
  startConfirmation,
  advanceConfirmation,
  accountConfirmationGuard,
  passwordResetGuard,
} from './confirm.js'

export { authenticateToken } from './authenticate.js'

export { reportSuccess, reportFailure, dropUserKeys } from './report.js'

// ============================================================
// Logging
// ============================================================

export { createDefaultLogger, createWinstonLogSink, createLevelFilter } from './log.js'

// ============================================================
// Constants
// ============================================================

export {
  CONFIRM_MAX_AGE_SECONDS,
  DEFAULT_DROP_USER_KEYS,
  DEFAULT_USER_MESSAGES,
} from './types.js'
