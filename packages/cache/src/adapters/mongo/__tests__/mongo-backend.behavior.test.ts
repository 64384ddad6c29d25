import { createNullLogger } from "@regionkit/logger"
import { ConfigurationError } from "../../../core/errors"
import type { BackendContext } from "../../../ports/cache-backend"
import { cached } from "../../../tests/utils/cache-test-helpers"
import { FakeClock } from "../../../tests/utils/fake-clock"
import { FakeMongoCollection } from "../../../tests/utils/fake-mongo-collection"
import type { MongoConnectionSettings } from "../mongo-cache-collection"
import { createMongoBackendFactory } from "../mongo-backend"

describe("MongoCacheBackend behavior", () => {
  let clock: FakeClock
  let collection: FakeMongoCollection
  let settings: MongoConnectionSettings[]
  let context: BackendContext

  const factory = () =>
    createMongoBackendFactory({
      createCollection: (s) => {
        settings.push(s)
        return collection
      },
    })

  beforeEach(() => {
    clock = new FakeClock()
    collection = new FakeMongoCollection()
    settings = []
    context = { logger: createNullLogger(), clock, expirationTime: 600 }
  })

  it("maps arguments to connection settings", () => {
    factory()(
      {
        db_hosts: "mongo-1:27017,mongo-2:27017",
        db_name: "cache_db",
        cache_collection: "regions",
        username: "u",
        password: "p",
        replicaset_name: "rs0",
        ssl: "true",
      },
      context,
    )

    expect(settings).toStrictEqual([
      {
        hosts: "mongo-1:27017,mongo-2:27017",
        database: "cache_db",
        collection: "regions",
        username: "u",
        password: "p",
        replicaSet: "rs0",
        tls: true,
      },
    ])
  })

  it("uses the default collection name", () => {
    factory()({ db_hosts: "localhost", db_name: "cache_db" }, context)

    expect(settings[0]?.collection).toBe("cache")
  })

  it("requires db_hosts and db_name", () => {
    expect(() => factory()({ db_name: "cache_db" }, context)).toThrow(ConfigurationError)
    expect(() => factory()({ db_hosts: "localhost" }, context)).toThrow(ConfigurationError)
  })

  it("stamps doc_date with the current time on every write", async () => {
    const backend = factory()({ db_hosts: "localhost", db_name: "cache_db" }, context)

    await backend.set("k", cached(1))

    expect(collection.documents.get("k")?.docDate).toStrictEqual(clock.now())
  })

  it("creates the TTL index once, before the first write", async () => {
    const backend = factory()(
      { db_hosts: "localhost", db_name: "cache_db", mongo_ttl_seconds: "3600" },
      context,
    )

    await backend.get("k")
    expect(collection.ttlIndexes).toStrictEqual([])

    await backend.set("a", cached(1))
    await backend.setMulti([["b", cached(2)]])

    expect(collection.ttlIndexes).toStrictEqual([3600])
  })

  it("skips the TTL index when mongo_ttl_seconds is not set", async () => {
    const backend = factory()({ db_hosts: "localhost", db_name: "cache_db" }, context)

    await backend.set("a", cached(1))

    expect(collection.ttlIndexes).toStrictEqual([])
  })

  it("retries the TTL index after a failed attempt", async () => {
    const backend = factory()(
      { db_hosts: "localhost", db_name: "cache_db", mongo_ttl_seconds: "60" },
      context,
    )
    collection.failNextIndex = true

    await expect(backend.set("a", cached(1))).rejects.toThrow("index build failed")
    await backend.set("a", cached(1))

    expect(collection.ttlIndexes).toStrictEqual([60])
    expect(collection.documents.has("a")).toBe(true)
  })

  it("closes the collection", async () => {
    const backend = factory()({ db_hosts: "localhost", db_name: "cache_db" }, context)

    await backend.close?.()

    expect(collection.closed).toBe(true)
  })
})
