// @latchkey/runtime — Uniform workflow reporting
//
// Every failure path logs its real reason at warn level and returns one
// of the generic caller-facing messages. Nothing about which step failed
// reaches the caller.

import type { LogSink } from './log.js'
import type {
  GuardReply,
  PublicUser,
  UserId,
  UserMessages,
  UserRecord,
  WorkflowResult,
} from './types.js'

/** What the reporting step needs from the resolved configuration */
export interface ReportContext {
  readonly logSink: LogSink
  readonly dropUserKeys: readonly string[]
  readonly userMessages: UserMessages
  readonly logMeta: Readonly<Record<string, unknown>>
}

/**
 * Logs at info level and returns the user without the configured
 * sensitive fields.
 */
export function reportSuccess(
  context: ReportContext,
  user: UserRecord,
  message: string,
): WorkflowResult {
  context.logSink.log({ level: 'info', user: user.id, message, meta: context.logMeta })
  return { ok: true, user: dropUserKeys(user, context.dropUserKeys) }
}

/**
 * Logs the internal reason at warn level and returns the generic message
 * selected by `reply`.
 */
export function reportFailure(
  context: ReportContext,
  user: UserId | null,
  message: string,
  reply: GuardReply = 'defaultError',
): WorkflowResult {
  context.logSink.log({ level: 'warn', user, message, meta: context.logMeta })
  return { ok: false, error: context.userMessages[reply] }
}

/** Copies a user record without the listed fields. */
export function dropUserKeys(user: UserRecord, keys: readonly string[]): PublicUser {
  const dropped = new Set(keys)
  return Object.fromEntries(Object.entries(user).filter(([key]) => !dropped.has(key)))
}
