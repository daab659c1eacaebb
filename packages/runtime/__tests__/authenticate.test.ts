import { describe, it, expect } from 'vitest'
import { createLatchkey } from '../src/latchkey.js'
import { NOW, TEST_SECRET, createMemoryLogSink, createUserStore, testUser } from './fixtures.js'

function setup() {
  const logSink = createMemoryLogSink()
  const latchkey = createLatchkey({
    keySource: TEST_SECRET,
    tokenSalt: 'session-tokens',
    userContext: createUserStore([testUser({ id: 5 })]),
    logSink,
  })
  return { latchkey, logSink }
}

describe('authenticate', () => {
  it('should resolve the user a token was issued for', async () => {
    const { latchkey, logSink } = setup()
    const token = await latchkey.sign(5, { now: NOW })

    const result = await latchkey.authenticate(token, { now: NOW + 14400 })

    expect(result).toEqual({
      ok: true,
      user: { id: 5, email: 'fred@example.com', confirmedAt: null, resetSentAt: null },
    })
    expect(logSink.entries).toEqual([
      { level: 'info', user: 5, message: 'user authenticated', meta: {} },
    ])
  })

  it('should reject a token past its four hour lifetime', async () => {
    const { latchkey, logSink } = setup()
    const token = await latchkey.sign(5, { now: NOW })

    const result = await latchkey.authenticate(token, { now: NOW + 14401 })

    expect(result).toEqual({ ok: false, error: 'Invalid credentials' })
    expect(logSink.entries).toEqual([
      { level: 'warn', user: null, message: 'expired token', meta: {} },
    ])
  })

  it('should reject a missing token', async () => {
    const { latchkey, logSink } = setup()
    expect(await latchkey.authenticate(undefined)).toEqual({
      ok: false,
      error: 'Invalid credentials',
    })
    expect(logSink.entries[0]?.message).toBe('invalid token')
  })

  it('should reject a token for an unknown user', async () => {
    const { latchkey, logSink } = setup()
    const token = await latchkey.sign(6, { now: NOW })

    const result = await latchkey.authenticate(token, { now: NOW })

    expect(result).toEqual({ ok: false, error: 'Invalid credentials' })
    expect(logSink.entries[0]?.message).toBe('no user found')
  })
})
