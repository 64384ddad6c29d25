import type { Logger } from "@regionkit/logger"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import { ProxyBackend } from "./proxy-backend"

/**
 * Logs every backend call at debug level. Reads are logged with their
 * result, writes and deletes with their input.
 */
export class DebugProxy extends ProxyBackend {
  constructor(private readonly logger: Logger) {
    super()
  }

  async get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    const value = await this.proxied.get(key)
    this.logger.debug("CACHE_GET", { key, value })
    return value
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    const values = await this.proxied.getMulti(keys)
    this.logger.debug("CACHE_GET_MULTI", { keys, values })
    return values
  }

  async set(key: CacheKey, value: CachedValue): Promise<void> {
    this.logger.debug("CACHE_SET", { key, value })
    await this.proxied.set(key, value)
  }

  async setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    this.logger.debug("CACHE_SET_MULTI", {
      keys: entries.map(([key]) => key),
      values: entries.map(([, value]) => value),
    })
    await this.proxied.setMulti(entries)
  }

  async delete(key: CacheKey): Promise<void> {
    await this.proxied.delete(key)
    this.logger.debug("CACHE_DELETE", { key })
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    this.logger.debug("CACHE_DELETE_MULTI", { keys })
    await this.proxied.deleteMulti(keys)
  }
}
