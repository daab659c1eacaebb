import { describe, it, expect } from 'vitest'
import { resolveSecret, validateSecret } from '../src/key-source.js'
import type { Endpoint } from '../src/key-source.js'
import { ConfigurationError } from '../src/errors.js'

describe('key-source', () => {
  const secret = 'test-secret-key-base-0123456789'

  function endpoint(name: string, value: string | null | undefined): Endpoint {
    return { name, secretKeyBase: () => value }
  }

  describe('resolveSecret', () => {
    it('should use a raw string as the secret', () => {
      expect(resolveSecret(secret)).toBe(secret)
    })

    it('should use the secret carried by a connection', () => {
      expect(resolveSecret({ kind: 'connection', secretKeyBase: secret })).toBe(secret)
    })

    it('should resolve the endpoint referenced by a socket', () => {
      expect(resolveSecret({ kind: 'socket', endpoint: endpoint('AppEndpoint', secret) })).toBe(
        secret,
      )
    })

    it('should resolve an endpoint', () => {
      expect(resolveSecret({ kind: 'endpoint', endpoint: endpoint('AppEndpoint', secret) })).toBe(
        secret,
      )
    })

    it('should read the endpoint configuration on every call', () => {
      let current = secret
      const source = {
        kind: 'endpoint' as const,
        endpoint: { name: 'AppEndpoint', secretKeyBase: () => current },
      }
      expect(resolveSecret(source)).toBe(secret)
      current = 'another-secret-key-base-987654321'
      expect(resolveSecret(source)).toBe('another-secret-key-base-987654321')
    })

    it('should name the endpoint when it has no secret configured', () => {
      expect(() => resolveSecret({ kind: 'endpoint', endpoint: endpoint('AppEndpoint', null) })).toThrow(
        'no secretKeyBase configuration found in AppEndpoint',
      )
      expect(() =>
        resolveSecret({ kind: 'socket', endpoint: endpoint('SocketEndpoint', undefined) }),
      ).toThrow('no secretKeyBase configuration found in SocketEndpoint')
    })

    it('should fail when a connection carries no secret', () => {
      expect(() => resolveSecret({ kind: 'connection', secretKeyBase: undefined })).toThrow(
        'The secretKeyBase has not been set',
      )
    })

    it('should reject a short secret from any source', () => {
      const short = 'too-short-secret'
      expect(() => resolveSecret(short)).toThrow(ConfigurationError)
      expect(() => resolveSecret({ kind: 'connection', secretKeyBase: short })).toThrow(
        ConfigurationError,
      )
      expect(() => resolveSecret({ kind: 'endpoint', endpoint: endpoint('E', short) })).toThrow(
        'The secretKeyBase is too short. It should be at least 20 bytes long.',
      )
    })
  })

  describe('validateSecret', () => {
    it('should accept exactly 20 bytes', () => {
      expect(validateSecret('a'.repeat(20))).toBe('a'.repeat(20))
    })

    it('should reject 19 bytes', () => {
      expect(() => validateSecret('a'.repeat(19))).toThrow(ConfigurationError)
    })

    it('should measure length in UTF-8 bytes', () => {
      // 10 characters, 20 bytes
      expect(validateSecret('é'.repeat(10))).toBe('é'.repeat(10))
      // 19 characters, one of them two bytes long: 20 bytes
      expect(validateSecret('é' + 'a'.repeat(18))).toBe('é' + 'a'.repeat(18))
    })

    it('should flag a fatal configuration error, not a verification failure', () => {
      try {
        validateSecret(null)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError)
        expect(error).toMatchObject({ code: 'configuration_error' })
      }
    })
  })
})
