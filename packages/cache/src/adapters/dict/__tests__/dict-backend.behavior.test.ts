import { createNullLogger } from "@regionkit/logger"
import { ConfigurationError } from "../../../core/errors"
import { NO_VALUE } from "../../../ports/cache-result"
import { cached } from "../../../tests/utils/cache-test-helpers"
import { FakeClock } from "../../../tests/utils/fake-clock"
import { createDictBackend, DictCacheBackend } from "../dict-backend"

describe("DictCacheBackend behavior", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock()
  })

  it("keeps entries forever when expirationTime is 0", async () => {
    const backend = new DictCacheBackend({ clock }, { expirationTime: 0 })

    await backend.set("k", cached("v"))
    clock.advanceSeconds(60 * 60 * 24 * 365)

    expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: cached("v") })
  })

  it("drops entries once expirationTime has elapsed", async () => {
    const backend = new DictCacheBackend({ clock }, { expirationTime: 10 })

    await backend.set("k", cached("v"))

    clock.advance(9_999)
    expect((await backend.get("k")).kind).toBe("hit")

    clock.advance(1)
    expect(await backend.get("k")).toBe(NO_VALUE)
    expect(backend.size).toBe(0)
  })

  it("restarts the expiry window on overwrite", async () => {
    const backend = new DictCacheBackend({ clock }, { expirationTime: 10 })

    await backend.set("k", cached(1))
    clock.advanceSeconds(8)
    await backend.set("k", cached(2))
    clock.advanceSeconds(8)

    expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: cached(2) })
  })

  it("stores values by reference", async () => {
    const backend = new DictCacheBackend({ clock })
    const value = cached({ n: 1 })

    await backend.set("k", value)
    const res = await backend.get("k")

    expect(res.kind === "hit" && res.value).toBe(value)
  })

  describe("createDictBackend", () => {
    const context = { logger: createNullLogger(), clock: new FakeClock(), expirationTime: 600 }

    it("reads expiration_time from string arguments", async () => {
      const backend = createDictBackend({ expiration_time: "5" }, context)

      await backend.set("k", cached("v"))
      context.clock.advanceSeconds(5)

      expect(await backend.get("k")).toBe(NO_VALUE)
    })

    it("ignores the region expiration when no argument is given", async () => {
      const backend = createDictBackend({}, context)

      await backend.set("k", cached("v"))
      context.clock.advanceSeconds(6_000)

      expect((await backend.get("k")).kind).toBe("hit")
    })

    it("rejects a non-numeric expiration_time", () => {
      expect(() => createDictBackend({ expiration_time: "soon" }, context)).toThrow(ConfigurationError)
    })
  })
})
