// @latchkey/runtime — Token authentication

import type { VerifyResult } from '@latchkey/core'
import { type ReportContext, reportFailure, reportSuccess } from './report.js'
import type { TokenCallOptions, UserContext, WorkflowResult } from './types.js'

export interface AuthenticationDeps extends ReportContext {
  readonly verify: (token: unknown, options: TokenCallOptions) => Promise<VerifyResult>
  readonly userContext: UserContext
}

/**
 * Resolves the user a token was issued for.
 *
 * The token string must already be extracted from the request (header,
 * cookie or body). Failures are logged at warn level and return the
 * default error message.
 */
export async function authenticateToken(
  deps: AuthenticationDeps,
  token: unknown,
  options: TokenCallOptions = {},
): Promise<WorkflowResult> {
  const verified = await deps.verify(token, options)
  if (!verified.ok) {
    return reportFailure(deps, null, verified.error)
  }

  const user = await deps.userContext.getBy(verified.data)
  if (user === null || user === undefined) {
    return reportFailure(deps, null, 'no user found')
  }

  return reportSuccess(deps, user, 'user authenticated')
}
