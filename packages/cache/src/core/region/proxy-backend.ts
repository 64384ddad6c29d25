import { BaseError } from "@regionkit/errors"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import type { KeyMangler } from "../../ports/key-mangler"

/**
 * Base for backends that sit in front of another backend.
 *
 * Every operation forwards to the wrapped backend unchanged; subclasses
 * override the ones they care about and reach the next layer through
 * {@link ProxyBackend.proxied}. A region wraps proxies in the order they are
 * added, so the last one added sees calls first.
 */
export abstract class ProxyBackend implements CacheBackend {
  private next: CacheBackend | undefined

  wrap(backend: CacheBackend): this {
    this.next = backend
    return this
  }

  protected get proxied(): CacheBackend {
    if (this.next === undefined) {
      throw new BaseError(`${this.constructor.name} is not wrapped around a backend`, {
        code: "cache.proxy_not_wrapped",
        isOperational: false,
      })
    }

    return this.next
  }

  get keyMangler(): KeyMangler | undefined {
    return this.proxied.keyMangler
  }

  get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    return this.proxied.get(key)
  }

  getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    return this.proxied.getMulti(keys)
  }

  set(key: CacheKey, value: CachedValue): Promise<void> {
    return this.proxied.set(key, value)
  }

  setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    return this.proxied.setMulti(entries)
  }

  delete(key: CacheKey): Promise<void> {
    return this.proxied.delete(key)
  }

  deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    return this.proxied.deleteMulti(keys)
  }

  async close(): Promise<void> {
    await this.proxied.close?.()
  }
}
