import { createNullLogger } from "@regionkit/logger"
import { describeBackendContract } from "../../../ports/__tests__/cache-backend.contract"
import { FakeClock } from "../../../tests/utils/fake-clock"
import { FakeMemcacheServer } from "../../../tests/utils/fake-memcache-client"
import { createPooledMemcacheBackendFactory } from "../pooled-memcache-backend"

describeBackendContract("PooledMemcacheBackend", () => {
  const server = new FakeMemcacheServer()
  const factory = createPooledMemcacheBackendFactory({ createClient: () => server.connect() })

  return factory(
    { url: "cache-a:11211", pool_maxsize: "2" },
    { logger: createNullLogger(), clock: new FakeClock(), expirationTime: null },
  )
})
