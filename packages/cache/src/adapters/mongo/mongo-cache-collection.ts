import { Binary, type Collection, type Document, MongoClient, type MongoClientOptions } from "mongodb"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { Seconds } from "../../ports/time"

/**
 * Document layout of the cache collection: one document per key.
 */
interface CacheDocument extends Document {
  _id: string
  value: Binary
  doc_date: Date
}

/**
 * Collection operations the Mongo backend needs, in cache terms.
 */
export interface MongoCacheCollection {
  findOne(key: CacheKey): Promise<Uint8Array | null>

  /** Values for the keys that exist; absent keys are left out. */
  findMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, Uint8Array>>

  /** Inserts or replaces each entry, stamping `doc_date`. */
  upsertMany(entries: readonly CacheEntry<Uint8Array>[], docDate: Date): Promise<void>

  deleteMany(keys: readonly CacheKey[]): Promise<void>

  /** Creates the TTL index on `doc_date`. Safe to call repeatedly. */
  ensureTtlIndex(ttl: Seconds): Promise<void>

  close(): Promise<void>
}

export type MongoConnectionSettings = {
  /** `host[:port][,host[:port]...]` */
  hosts: string
  database: string
  collection: string
  username?: string | undefined
  password?: string | undefined
  replicaSet?: string | undefined
  tls?: boolean | undefined
}

export function createMongoCacheCollection(settings: MongoConnectionSettings): MongoCacheCollection {
  const options: MongoClientOptions = {
    ...(settings.username !== undefined && {
      auth: { username: settings.username, password: settings.password },
    }),
    ...(settings.replicaSet !== undefined && { replicaSet: settings.replicaSet }),
    ...(settings.tls !== undefined && { tls: settings.tls }),
  }
  const client = new MongoClient(`mongodb://${settings.hosts}`, options)
  const collection: Collection<CacheDocument> = client
    .db(settings.database)
    .collection<CacheDocument>(settings.collection)

  return {
    async findOne(key) {
      const doc = await collection.findOne({ _id: key })
      return doc === null ? null : doc.value.buffer
    },

    async findMany(keys) {
      const docs = await collection.find({ _id: { $in: [...keys] } }).toArray()
      return new Map(docs.map((doc): [CacheKey, Uint8Array] => [doc._id, doc.value.buffer]))
    },

    async upsertMany(entries, docDate) {
      if (entries.length === 0) return

      await collection.bulkWrite(
        entries.map(([key, value]) => ({
          replaceOne: {
            filter: { _id: key },
            replacement: { value: new Binary(value), doc_date: docDate },
            upsert: true,
          },
        })),
        { ordered: false },
      )
    },

    async deleteMany(keys) {
      if (keys.length === 0) return
      await collection.deleteMany({ _id: { $in: [...keys] } })
    },

    async ensureTtlIndex(ttl) {
      await collection.createIndex({ doc_date: 1 }, { expireAfterSeconds: ttl, name: "doc_date_ttl" })
    },

    async close() {
      await client.close()
    },
  }
}
