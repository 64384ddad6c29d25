import { z } from "zod"
import { numberArgument, parseBackendArguments } from "../../core/arguments/parse-backend-arguments"
import { BACKEND_NAMES } from "../../core/registry/backend-names"
import type { BackendFactory, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, NO_VALUE } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import type { Milliseconds, Seconds } from "../../ports/time"
import type { TimeSource } from "../../ports/time-source"

export type DictCacheBackendDeps = {
  clock: TimeSource
}

export type DictCacheBackendOptions = {
  /**
   * Seconds an entry is kept after its last write. `0` keeps entries until
   * they are deleted.
   */
  expirationTime: Seconds
}

type DictEntry = {
  value: CachedValue
  expiresAtMs?: Milliseconds
}

/**
 * In-process backend on a `Map`. Values are stored by reference.
 */
export class DictCacheBackend implements CacheBackend {
  private readonly store = new Map<CacheKey, DictEntry>()

  constructor(
    private readonly deps: DictCacheBackendDeps,
    private readonly opts: DictCacheBackendOptions = { expirationTime: 0 },
  ) {}

  get size(): number {
    return this.store.size
  }

  async get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    return this.read(key)
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    return keys.map((key) => this.read(key))
  }

  async set(key: CacheKey, value: CachedValue): Promise<void> {
    this.write(key, value)
  }

  async setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    for (const [key, value] of entries) {
      this.write(key, value)
    }
  }

  async delete(key: CacheKey): Promise<void> {
    this.store.delete(key)
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    for (const key of keys) {
      this.store.delete(key)
    }
  }

  private read(key: CacheKey): CacheResult<CachedValue> {
    const entry = this.store.get(key)
    if (entry === undefined) return NO_VALUE

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.store.delete(key)
      return NO_VALUE
    }

    return { kind: "hit", value: entry.value }
  }

  private write(key: CacheKey, value: CachedValue): void {
    if (this.opts.expirationTime > 0) {
      this.store.set(key, {
        value,
        expiresAtMs: this.deps.clock.nowMs() + this.opts.expirationTime * 1000,
      })
    } else {
      this.store.set(key, { value })
    }
  }
}

const dictArgumentsSchema = z.object({
  expiration_time: numberArgument.nonnegative().default(0),
})

export const createDictBackend: BackendFactory = (args, context) => {
  const { expiration_time } = parseBackendArguments(BACKEND_NAMES.dict, dictArgumentsSchema, args)

  return new DictCacheBackend({ clock: context.clock }, { expirationTime: expiration_time })
}
