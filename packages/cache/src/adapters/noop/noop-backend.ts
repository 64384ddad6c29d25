import type { BackendFactory, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, NO_VALUE } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"

/**
 * Stores nothing. Every read is a miss.
 */
export class NoopCacheBackend implements CacheBackend {
  async get(_key: CacheKey): Promise<CacheResult<CachedValue>> {
    return NO_VALUE
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    return keys.map(() => NO_VALUE)
  }

  async set(_key: CacheKey, _value: CachedValue): Promise<void> {}

  async setMulti(_entries: readonly CacheEntry<CachedValue>[]): Promise<void> {}

  async delete(_key: CacheKey): Promise<void> {}

  async deleteMulti(_keys: readonly CacheKey[]): Promise<void> {}
}

export const createNoopBackend: BackendFactory = () => new NoopCacheBackend()
