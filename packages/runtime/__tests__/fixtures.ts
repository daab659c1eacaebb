import type { TokenData } from '@latchkey/core'
import type { LogEntry, LogSink } from '../src/log.js'
import type { UserContext, UserRecord } from '../src/types.js'

export const TEST_SECRET = 'test-secret-key-base-0123456789'

export const NOW = 1_700_000_000

export interface TestUser extends UserRecord {
  readonly id: number
  readonly email: string
  readonly passwordHash: string
  readonly confirmedAt: string | null
  readonly resetSentAt: string | null
}

export function testUser(overrides: Partial<TestUser> = {}): TestUser {
  return {
    id: 1,
    email: 'fred@example.com',
    passwordHash: 'hashed-test-password',
    confirmedAt: null,
    resetSentAt: null,
    ...overrides,
  }
}

/** In-memory user lookup by id (integer data) or email (map data) */
export function createUserStore(
  users: readonly TestUser[],
): UserContext & { readonly lookups: TokenData[] } {
  const lookups: TokenData[] = []
  return {
    lookups,
    getBy(attrs: TokenData): TestUser | undefined {
      lookups.push(attrs)
      if (typeof attrs === 'object') {
        return users.find((user) => user.email === attrs['email'])
      }
      return users.find((user) => user.id === attrs)
    },
  }
}

/** Log sink that keeps every entry */
export function createMemoryLogSink(): LogSink & { readonly entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return {
    entries,
    log(entry: LogEntry): void {
      entries.push(entry)
    },
  }
}
