import { NO_VALUE } from "../../../ports/cache-result"
import { cached } from "../../../tests/utils/cache-test-helpers"
import { NoopCacheBackend } from "../noop-backend"

describe("NoopCacheBackend", () => {
  it("returns the no-value marker after a set", async () => {
    const backend = new NoopCacheBackend()

    await backend.set("k", cached("v"))

    expect(await backend.get("k")).toBe(NO_VALUE)
  })

  it("returns one miss per requested key", async () => {
    const backend = new NoopCacheBackend()

    await backend.setMulti([["a", cached(1)]])

    expect(await backend.getMulti(["a", "b"])).toStrictEqual([NO_VALUE, NO_VALUE])
  })

  it("accepts deletes of anything", async () => {
    const backend = new NoopCacheBackend()

    await expect(backend.delete("k")).resolves.toBeUndefined()
    await expect(backend.deleteMulti(["a", "b"])).resolves.toBeUndefined()
  })
})
