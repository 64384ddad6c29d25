import { createSuperJsonCodec } from "../../../core/codec/superjson-codec"
import { describeBackendContract } from "../../../ports/__tests__/cache-backend.contract"
import type { CachedValue } from "../../../ports/cached-value"
import { FakeClock } from "../../../tests/utils/fake-clock"
import { FakeMongoCollection } from "../../../tests/utils/fake-mongo-collection"
import { MongoCacheBackend } from "../mongo-backend"

describeBackendContract(
  "MongoCacheBackend",
  () =>
    new MongoCacheBackend(
      {
        collection: new FakeMongoCollection(),
        codec: createSuperJsonCodec<CachedValue>(),
        clock: new FakeClock(),
      },
      { ttlSeconds: 300 },
    ),
)
