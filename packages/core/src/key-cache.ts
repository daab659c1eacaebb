// @latchkey/core — LRU cache for derived signing keys

import { DEFAULT_KEY_CACHE_MAX } from './types.js'

/**
 * Cache of derived keys, keyed by the full derivation tuple
 * (secret, salt, iterations, key length, digest).
 *
 * - Stores the pending promise so concurrent callers share one derivation
 * - LRU eviction at capacity
 * - Purely a performance layer: every call produces the same key with or
 *   without it
 */
export interface KeyCache {
  get(id: string): Promise<CryptoKey> | undefined

  /** Stores a derivation. A rejected derivation removes itself. */
  set(id: string, key: Promise<CryptoKey>): void

  clear(): void

  /** Current number of entries in the cache */
  readonly size: number
}

/**
 * Configuration for the key cache.
 */
export interface KeyCacheConfig {
  /** Maximum number of entries (default: 64) */
  readonly maxEntries?: number
}

/**
 * Builds the cache id of a derivation tuple. Fields are length-prefixed so
 * no two distinct tuples share an id.
 */
export function keyCacheId(
  secret: string,
  salt: string,
  iterations: number,
  keyLength: number,
  digest: string,
): string {
  return [digest, String(iterations), String(keyLength), salt, secret]
    .map((part) => `${String(part.length)}:${part}`)
    .join('|')
}

/**
 * Creates an in-memory LRU key cache.
 *
 * @param config - Optional cache configuration
 */
export function createKeyCache(config?: KeyCacheConfig): KeyCache {
  const maxEntries = config?.maxEntries ?? DEFAULT_KEY_CACHE_MAX

  // Map preserves insertion order; the first entry is the least recently used
  const cache = new Map<string, Promise<CryptoKey>>()

  function evictLRU(): void {
    while (cache.size >= maxEntries) {
      // oldest first
      const firstKey = cache.keys().next().value
      if (firstKey === undefined) return
      cache.delete(firstKey)
    }
  }

  return {
    get(id: string): Promise<CryptoKey> | undefined {
      const entry = cache.get(id)
      if (entry === undefined) return undefined

      // Refresh recency
      cache.delete(id)
      cache.set(id, entry)
      return entry
    },

    set(id: string, key: Promise<CryptoKey>): void {
      cache.delete(id)
      evictLRU()
      cache.set(id, key)

      void key.catch(() => {
        if (cache.get(id) === key) {
          cache.delete(id)
        }
      })
    },

    clear(): void {
      cache.clear()
    },

    get size(): number {
      return cache.size
    },
  }
}
