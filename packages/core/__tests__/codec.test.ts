import { describe, it, expect } from 'vitest'
import { decodePayload, encodePayload } from '../src/codec.js'
import type { JsonObject, JsonValue } from '../src/types.js'

describe('codec', () => {
  describe('encodePayload', () => {
    it('should sort object keys', () => {
      expect(encodePayload({ data: { id: 1, email: 'fred@example.com' }, exp: 1700014400 })).toBe(
        '{"data":{"email":"fred@example.com","id":1},"exp":1700014400}',
      )
    })

    it('should sort keys at every depth', () => {
      const first = encodePayload({
        data: { z: { b: 2, a: 1 }, list: [{ y: 1, x: 2 }] },
        exp: 5,
      })
      const second = encodePayload({
        data: { list: [{ x: 2, y: 1 }], z: { a: 1, b: 2 } },
        exp: 5,
      })
      expect(first).toBe(second)
      expect(first).toBe('{"data":{"list":[{"x":2,"y":1}],"z":{"a":1,"b":2}},"exp":5}')
    })

    it('should encode string and integer data', () => {
      expect(encodePayload({ data: 'user-42', exp: 10 })).toBe('{"data":"user-42","exp":10}')
      expect(encodePayload({ data: 42, exp: 10 })).toBe('{"data":42,"exp":10}')
    })

    it('should keep a "__proto__" key as an ordinary member', () => {
      const entries: [string, JsonValue][] = [
        ['id', 1],
        ['__proto__', { role: 'x' }],
      ]
      const data: JsonObject = Object.fromEntries(entries)
      const encoded = encodePayload({ data, exp: 10 })
      expect(encoded).toBe('{"data":{"__proto__":{"role":"x"},"id":1},"exp":10}')

      const decoded = decodePayload(encoded)
      expect(decoded === null ? null : JSON.stringify(decoded.data)).toBe(
        '{"__proto__":{"role":"x"},"id":1}',
      )
    })
  })

  describe('decodePayload', () => {
    it('should decode an encoded payload', () => {
      const payload = { data: { email: 'fred@example.com', roles: ['admin'] }, exp: 1700014400 }
      expect(decodePayload(encodePayload(payload))).toEqual(payload)
    })

    it('should return null for text that is not JSON', () => {
      expect(decodePayload('')).toBeNull()
      expect(decodePayload('{"data":')).toBeNull()
    })

    it('should return null for JSON that is not an object', () => {
      expect(decodePayload('[1,2]')).toBeNull()
      expect(decodePayload('"data"')).toBeNull()
      expect(decodePayload('null')).toBeNull()
    })

    it('should return null when exp is missing or not an integer', () => {
      expect(decodePayload('{"data":1}')).toBeNull()
      expect(decodePayload('{"data":1,"exp":"1700014400"}')).toBeNull()
      expect(decodePayload('{"data":1,"exp":1.5}')).toBeNull()
    })

    it('should return null when data is missing or of an unsupported type', () => {
      expect(decodePayload('{"exp":1}')).toBeNull()
      expect(decodePayload('{"data":null,"exp":1}')).toBeNull()
      expect(decodePayload('{"data":true,"exp":1}')).toBeNull()
      expect(decodePayload('{"data":[1],"exp":1}')).toBeNull()
    })
  })
})
