import { createPool, type Pool } from "generic-pool"
import { createSuperJsonCodec } from "../../core/codec/superjson-codec"
import type { BackendFactory, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, NO_VALUE } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import type { Codec } from "../../ports/codec"
import type { Seconds } from "../../ports/time"
import {
  createMemjsClient,
  type MemcacheClient,
  type MemcacheClientOptions,
} from "./memcache-client"
import { reshapePooledMemcacheArguments } from "./pooled-memcache-arguments"

export type PooledMemcacheBackendDeps = {
  pool: Pool<MemcacheClient>
  codec: Codec<CachedValue>
}

export type PooledMemcacheBackendOptions = {
  expirationTime: Seconds
}

/**
 * Memcached backend that borrows a client from a bounded pool for every
 * operation, bulk operations included.
 */
export class PooledMemcacheBackend implements CacheBackend {
  constructor(
    private readonly deps: PooledMemcacheBackendDeps,
    private readonly opts: PooledMemcacheBackendOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    const bytes = await this.deps.pool.use((client) => client.get(key))
    return this.toResult(bytes)
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    if (keys.length === 0) return []

    const values = await this.deps.pool.use((client) =>
      Promise.all(keys.map((key) => client.get(key))),
    )

    return values.map((bytes) => this.toResult(bytes))
  }

  async set(key: CacheKey, value: CachedValue): Promise<void> {
    await this.deps.pool.use((client) =>
      client.set(key, this.deps.codec.encode(value), this.opts.expirationTime),
    )
  }

  async setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    if (entries.length === 0) return

    await this.deps.pool.use((client) =>
      Promise.all(
        entries.map(([key, value]) =>
          client.set(key, this.deps.codec.encode(value), this.opts.expirationTime),
        ),
      ),
    )
  }

  async delete(key: CacheKey): Promise<void> {
    await this.deps.pool.use((client) => client.delete(key))
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    await this.deps.pool.use((client) => Promise.all(keys.map((key) => client.delete(key))))
  }

  async close(): Promise<void> {
    await this.deps.pool.drain()
    await this.deps.pool.clear()
  }

  private toResult(bytes: Uint8Array | null): CacheResult<CachedValue> {
    if (bytes === null) return NO_VALUE
    return { kind: "hit", value: this.deps.codec.decode(bytes) }
  }
}

export type PooledMemcacheFactoryDeps = {
  createClient?: (opts: MemcacheClientOptions) => MemcacheClient
}

export function createPooledMemcacheBackendFactory(
  deps: PooledMemcacheFactoryDeps = {},
): BackendFactory {
  const createClient = deps.createClient ?? createMemjsClient

  return (args) => {
    const settings = reshapePooledMemcacheArguments(args)

    const pool = createPool<MemcacheClient>(
      {
        create: async () => createClient({ servers: settings.servers, ...settings.client }),
        destroy: async (client) => client.close(),
      },
      {
        min: 0,
        max: settings.pool.max,
        idleTimeoutMillis: settings.pool.idleTimeoutMillis,
        evictionRunIntervalMillis: settings.pool.idleTimeoutMillis,
        acquireTimeoutMillis: settings.pool.acquireTimeoutMillis,
      },
    )

    return new PooledMemcacheBackend(
      { pool, codec: createSuperJsonCodec<CachedValue>() },
      { expirationTime: settings.expirationTime },
    )
  }
}

export const createPooledMemcacheBackend: BackendFactory = createPooledMemcacheBackendFactory()
