import { z } from "zod"
import {
  booleanArgument,
  numberArgument,
  parseBackendArguments,
} from "../../core/arguments/parse-backend-arguments"
import { createSuperJsonCodec } from "../../core/codec/superjson-codec"
import { BACKEND_NAMES } from "../../core/registry/backend-names"
import type { BackendFactory, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, NO_VALUE } from "../../ports/cache-result"
import type { CachedValue } from "../../ports/cached-value"
import type { Codec } from "../../ports/codec"
import type { Seconds } from "../../ports/time"
import type { TimeSource } from "../../ports/time-source"
import {
  createMongoCacheCollection,
  type MongoCacheCollection,
  type MongoConnectionSettings,
} from "./mongo-cache-collection"

export type MongoCacheBackendDeps = {
  collection: MongoCacheCollection
  codec: Codec<CachedValue>
  clock: TimeSource
}

export type MongoCacheBackendOptions = {
  /** When set, a TTL index on `doc_date` removes documents this long after their last write. */
  ttlSeconds?: Seconds | undefined
}

export class MongoCacheBackend implements CacheBackend {
  private ttlIndex: Promise<void> | undefined

  constructor(
    private readonly deps: MongoCacheBackendDeps,
    private readonly opts: MongoCacheBackendOptions = {},
  ) {}

  async get(key: CacheKey): Promise<CacheResult<CachedValue>> {
    return this.toResult(await this.deps.collection.findOne(key))
  }

  async getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]> {
    if (keys.length === 0) return []

    const found = await this.deps.collection.findMany(keys)
    return keys.map((key) => this.toResult(found.get(key) ?? null))
  }

  async set(key: CacheKey, value: CachedValue): Promise<void> {
    await this.setMulti([[key, value]])
  }

  async setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void> {
    if (entries.length === 0) return

    await this.ensureTtlIndex()
    await this.deps.collection.upsertMany(
      entries.map(([key, value]): CacheEntry<Uint8Array> => [key, this.deps.codec.encode(value)]),
      this.deps.clock.now(),
    )
  }

  async delete(key: CacheKey): Promise<void> {
    await this.deps.collection.deleteMany([key])
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return
    await this.deps.collection.deleteMany(keys)
  }

  async close(): Promise<void> {
    await this.deps.collection.close()
  }

  private ensureTtlIndex(): Promise<void> {
    const ttl = this.opts.ttlSeconds
    if (ttl === undefined) return Promise.resolve()

    this.ttlIndex ??= this.deps.collection.ensureTtlIndex(ttl).catch((err: unknown) => {
      this.ttlIndex = undefined
      throw err
    })

    return this.ttlIndex
  }

  private toResult(bytes: Uint8Array | null): CacheResult<CachedValue> {
    if (bytes === null) return NO_VALUE
    return { kind: "hit", value: this.deps.codec.decode(bytes) }
  }
}

const mongoArgumentsSchema = z.object({
  db_hosts: z.string().min(1),
  db_name: z.string().min(1),
  cache_collection: z.string().min(1).default("cache"),
  username: z.string().optional(),
  password: z.string().optional(),
  replicaset_name: z.string().optional(),
  ssl: booleanArgument.optional(),
  mongo_ttl_seconds: numberArgument.int().positive().optional(),
})

export type MongoBackendFactoryDeps = {
  createCollection?: (settings: MongoConnectionSettings) => MongoCacheCollection
}

export function createMongoBackendFactory(deps: MongoBackendFactoryDeps = {}): BackendFactory {
  const createCollection = deps.createCollection ?? createMongoCacheCollection

  return (args, context) => {
    const parsed = parseBackendArguments(BACKEND_NAMES.mongo, mongoArgumentsSchema, args)

    const collection = createCollection({
      hosts: parsed.db_hosts,
      database: parsed.db_name,
      collection: parsed.cache_collection,
      username: parsed.username,
      password: parsed.password,
      replicaSet: parsed.replicaset_name,
      tls: parsed.ssl,
    })

    return new MongoCacheBackend(
      { collection, codec: createSuperJsonCodec<CachedValue>(), clock: context.clock },
      { ttlSeconds: parsed.mongo_ttl_seconds },
    )
  }
}

export const createMongoBackend: BackendFactory = createMongoBackendFactory()
