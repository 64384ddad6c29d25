import { z } from "zod"
import { numberArgument, parseBackendArguments } from "../../core/arguments/parse-backend-arguments"
import { createSuperJsonCodec } from "../../core/codec/superjson-codec"
import { BACKEND_NAMES } from "../../core/registry/backend-names"
import type { BackendFactory, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, NO_VALUE } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import type { Codec } from "../../ports/codec"
import type { Seconds } from "../../ports/time"
import {
  createRedisCacheClient,
  createRedisSentinelCacheClient,
  type RedisCacheClient,
  type RedisNodeConnectOptions,
  type RedisSentinelConnectOptions,
  type RedisTtl,
} from "./redis-client"
import { reshapeSentinelArguments, type SentinelConnectionKwargs } from "./sentinel-arguments"

export type RedisCacheBackendDeps = {
  client: RedisCacheClient
  codec: Codec<CachedValue>
}

export type RedisCacheBackendOptions = {
  /** Server-side expiry for every write; `undefined` stores without one. */
  expirationTime?: Seconds | undefined

  /**
   * Maximum number of keys sent in a single command by the bulk methods.
   * Larger requests are split into batches of this size.
   */
  batchSize: number
}

const DEFAULT_BATCH_SIZE = 1000

/**
 * Redis backend. Connects on first use; concurrent first calls share one
 * connection attempt.
 */
export class RedisCacheBackend implements CacheBackend {
  private connecting: Promise<unknown> | undefined

  constructor(
    private readonly deps: RedisCacheBackendDeps,
    private readonly opts: RedisCacheBackendOptions = { batchSize: DEFAULT_BATCH_SIZE },
  ) {}

  async get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    const client = await this.open()
    return this.toResult(await client.get(key))
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    if (keys.length === 0) return []

    const client = await this.open()
    const out: CacheResult<CachedValue>[] = []

    for (const batch of this.chunks(keys)) {
      const buffers = await client.mGet(batch)
      out.push(...batch.map((_, i) => this.toResult(buffers[i] ?? null)))
    }

    return out
  }

  async set(key: CacheKey, value: CachedValue): Promise<void> {
    const client = await this.open()
    await client.set(key, this.deps.codec.encode(value), this.ttl())
  }

  async setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    if (entries.length === 0) return

    const client = await this.open()

    for (const batch of this.chunks(entries)) {
      const tx = client.multi()
      for (const [key, value] of batch) {
        tx.set(key, this.deps.codec.encode(value), this.ttl())
      }
      await tx.exec()
    }
  }

  async delete(key: CacheKey): Promise<void> {
    const client = await this.open()
    await client.del(key)
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    const client = await this.open()

    for (const batch of this.chunks(keys)) {
      await client.del(batch)
    }
  }

  async close(): Promise<void> {
    if (this.deps.client.isOpen) await this.deps.client.close()
  }

  private async open(): Promise<RedisCacheClient> {
    const { client } = this.deps

    if (!client.isOpen) {
      this.connecting ??= client.connect().finally(() => {
        this.connecting = undefined
      })
      await this.connecting
    }

    return client
  }

  private ttl(): RedisTtl | undefined {
    return this.opts.expirationTime === undefined ? undefined : { EX: this.opts.expirationTime }
  }

  private toResult(buffer: Uint8Array | null): CacheResult<CachedValue> {
    if (buffer === null) return NO_VALUE
    return { kind: "hit", value: this.deps.codec.decode(buffer) }
  }

  private *chunks<T>(items: readonly T[]): Generator<T[]> {
    const size = Math.max(1, this.opts.batchSize)

    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }
}

const expirationArgument = numberArgument.int().positive().optional()

// A list under `url` is the memcache server list every resolved config carries.
const redisUrlArgument = z.preprocess(
  (value) => (Array.isArray(value) ? undefined : value),
  z.string().min(1).default("redis://localhost:6379"),
)

const redisArgumentsSchema = z.object({
  url: redisUrlArgument,
  redis_expiration_time: expirationArgument,
})

export type RedisBackendFactoryDeps = {
  createClient?: (url: string) => RedisCacheClient
}

export function createRedisBackendFactory(deps: RedisBackendFactoryDeps = {}): BackendFactory {
  const createClient = deps.createClient ?? createRedisCacheClient

  return (args) => {
    const parsed = parseBackendArguments(BACKEND_NAMES.redis, redisArgumentsSchema, args)

    return new RedisCacheBackend(
      { client: createClient(parsed.url), codec: createSuperJsonCodec<CachedValue>() },
      { expirationTime: parsed.redis_expiration_time, batchSize: DEFAULT_BATCH_SIZE },
    )
  }
}

const sentinelBackendArgumentsSchema = z.object({
  service_name: z.string().min(1).default("mymaster"),
  db: numberArgument.int().nonnegative().optional(),
  socket_timeout: numberArgument.positive().optional(),
  redis_expiration_time: expirationArgument,
})

function toNodeOptions(
  kwargs: SentinelConnectionKwargs,
  extra: Pick<RedisNodeConnectOptions, "database" | "connectTimeoutMs">,
): RedisNodeConnectOptions {
  return {
    username: kwargs.username,
    password: kwargs.password,
    ...extra,
    tls: kwargs.ssl
      ? { certFile: kwargs.ssl_certfile, keyFile: kwargs.ssl_keyfile, caFile: kwargs.ssl_ca_certs }
      : undefined,
  }
}

export type RedisSentinelBackendFactoryDeps = {
  createClient?: (opts: RedisSentinelConnectOptions) => RedisCacheClient
}

export function createRedisSentinelBackendFactory(
  deps: RedisSentinelBackendFactoryDeps = {},
): BackendFactory {
  const createClient = deps.createClient ?? createRedisSentinelCacheClient

  return (args) => {
    const reshaped = reshapeSentinelArguments(args)
    const parsed = parseBackendArguments(
      BACKEND_NAMES.redisSentinel,
      sentinelBackendArgumentsSchema,
      reshaped,
    )
    const connectTimeoutMs =
      parsed.socket_timeout === undefined ? undefined : parsed.socket_timeout * 1000

    const client = createClient({
      name: parsed.service_name,
      sentinelRootNodes: reshaped.sentinels.map(([host, port]) => ({ host, port })),
      nodeClientOptions: toNodeOptions(reshaped.connection_kwargs, {
        database: parsed.db,
        connectTimeoutMs,
      }),
      sentinelClientOptions: toNodeOptions(reshaped.sentinel_kwargs, { connectTimeoutMs }),
    })

    return new RedisCacheBackend(
      { client, codec: createSuperJsonCodec<CachedValue>() },
      { expirationTime: parsed.redis_expiration_time, batchSize: DEFAULT_BATCH_SIZE },
    )
  }
}

export const createRedisBackend: BackendFactory = createRedisBackendFactory()

export const createRedisSentinelBackend: BackendFactory = createRedisSentinelBackendFactory()
