// @latchkey/runtime — Confirmation workflow (shared state machine + guards)

import { ContractViolationError } from '@latchkey/core'
import type { TokenData, VerifyResult } from '@latchkey/core'
import { type ReportContext, reportFailure, reportSuccess } from './report.js'
import type {
  ConfirmParams,
  ConfirmationGuard,
  TokenCallOptions,
  UserContext,
  UserRecord,
  WorkflowResult,
} from './types.js'
import { CONFIRM_MAX_AGE_SECONDS } from './types.js'

// ============================================================
// Guards
// ============================================================

function isSet(value: Date | string | null | undefined): boolean {
  return value !== null && value !== undefined
}

/** Account confirmation: only users that are not confirmed yet pass. */
export const accountConfirmationGuard: ConfirmationGuard = {
  name: 'account-confirmation',
  check(user: UserRecord) {
    if (isSet(user.confirmedAt)) {
      return { pass: false, message: 'user already confirmed', reply: 'alreadyConfirmed' }
    }
    return { pass: true, message: 'user confirmed' }
  },
}

/** Password reset: only users with a pending reset request pass. */
export const passwordResetGuard: ConfirmationGuard = {
  name: 'password-reset',
  check(user: UserRecord) {
    if (!isSet(user.resetSentAt)) {
      return {
        pass: false,
        message: 'no reset token found',
        reply: 'defaultError',
        logUser: false,
      }
    }
    return { pass: true, message: 'user confirmed for password reset' }
  },
}

// ============================================================
// State Machine
// ============================================================

/**
 * Confirmation states:
 * ```
 * awaiting-token → token-verified → user-resolved → reported
 * ```
 * Any step may jump straight to `reported` with a failure.
 */
export type ConfirmationState =
  | { readonly state: 'awaiting-token'; readonly token: unknown }
  | { readonly state: 'token-verified'; readonly data: TokenData }
  | { readonly state: 'user-resolved'; readonly user: UserRecord }
  | { readonly state: 'reported'; readonly result: WorkflowResult }

/** Collaborators of the confirmation state machine */
export interface ConfirmationDeps extends ReportContext {
  readonly verify: (token: unknown, options: TokenCallOptions) => Promise<VerifyResult>
  readonly userContext: UserContext
}

/**
 * Reads the token from confirmation params.
 *
 * @throws {ContractViolationError} If `params.key` is absent. The
 *   embedding application must always pass it.
 */
export function startConfirmation(params: ConfirmParams): ConfirmationState {
  const token = params['key']
  if (token === undefined) {
    throw new ContractViolationError('No key found in the params')
  }
  return { state: 'awaiting-token', token }
}

/**
 * Performs one transition of the state machine.
 *
 * The token is always verified with a 20-minute max age, whatever the
 * caller passed.
 */
export async function advanceConfirmation(
  current: ConfirmationState,
  deps: ConfirmationDeps,
  guard: ConfirmationGuard,
  options: TokenCallOptions,
): Promise<ConfirmationState> {
  switch (current.state) {
    case 'awaiting-token': {
      const verified = await deps.verify(current.token, {
        ...options,
        maxAge: CONFIRM_MAX_AGE_SECONDS,
      })
      if (!verified.ok) {
        return reported(reportFailure(deps, null, verified.error))
      }
      return { state: 'token-verified', data: verified.data }
    }

    case 'token-verified': {
      const user = await deps.userContext.getBy(current.data)
      if (user === null || user === undefined) {
        return reported(reportFailure(deps, null, 'no user found'))
      }
      return { state: 'user-resolved', user }
    }

    case 'user-resolved': {
      const verdict = guard.check(current.user)
      if (!verdict.pass) {
        const user = verdict.logUser === false ? null : current.user.id
        return reported(reportFailure(deps, user, verdict.message, verdict.reply))
      }
      return reported(reportSuccess(deps, current.user, verdict.message))
    }

    case 'reported':
      return current
  }
}

/**
 * Runs a confirmation from the request params to a reported result.
 *
 * @example
 * ```typescript
 * const result = await runConfirmation(deps, { key: token }, accountConfirmationGuard)
 * if (result.ok) {
 *   await users.markConfirmed(result.user)
 * }
 * ```
 *
 * @throws {ContractViolationError} If `params.key` is absent
 */
export async function runConfirmation(
  deps: ConfirmationDeps,
  params: ConfirmParams,
  guard: ConfirmationGuard,
  options: TokenCallOptions = {},
): Promise<WorkflowResult> {
  let current = startConfirmation(params)
  while (current.state !== 'reported') {
    current = await advanceConfirmation(current, deps, guard, options)
  }
  return current.result
}

function reported(result: WorkflowResult): ConfirmationState {
  return { state: 'reported', result }
}
