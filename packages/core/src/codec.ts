// @latchkey/core — Canonical payload serialization

import type { JsonValue, TokenData, TokenPayload } from './types.js'

/**
 * Serializes a payload as canonical JSON.
 *
 * Object keys are sorted at every depth, so two equal payloads always
 * produce the same string (and therefore the same signature).
 */
export function encodePayload(payload: TokenPayload): string {
  return JSON.stringify(canonicalize({ data: payload.data, exp: payload.exp }))
}

/**
 * Parses a payload produced by `encodePayload`.
 *
 * @returns The payload, or null if the text is not JSON or does not have
 *   the payload shape
 */
export function decodePayload(text: string): TokenPayload | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }

  if (!isRecord(parsed)) return null

  const { data, exp } = parsed
  if (typeof exp !== 'number' || !Number.isSafeInteger(exp)) return null
  if (!isTokenData(data)) return null

  return { data, exp }
}

function canonicalize(value: JsonValue): JsonValue {
  if (typeof value !== 'object' || value === null) {
    return value
  }
  if (isJsonArray(value)) {
    return value.map(canonicalize)
  }
  // fromEntries defines own properties, so a "__proto__" key survives
  return Object.fromEntries(
    Object.entries(value)
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, entry]): [string, JsonValue] => [key, canonicalize(entry)]),
  )
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1
  return a > b ? 1 : 0
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (value === null) return true
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

function isTokenData(value: unknown): value is TokenData {
  if (typeof value === 'string') return true
  if (typeof value === 'number') return Number.isFinite(value)
  return isRecord(value) && isJsonValue(value)
}
