import { createNullLogger } from "@regionkit/logger"
import { FakeClock } from "../../../tests/utils/fake-clock"
import type { FunctionKeyGenerator } from "../../keys/function-key-generator"
import { sha1MangleKey } from "../../keys/sha1-mangle-key"
import { type CacheRegion, createRegion } from "../../region/cache-region"
import { createDefaultRegistry } from "../../registry/builtin-backends"

describe("CacheRegion.cacheOnArguments", () => {
  let region: CacheRegion

  beforeEach(() => {
    region = createRegion({ logger: createNullLogger(), clock: new FakeClock() }).configure(
      "regionkit.dict",
      { registry: createDefaultRegistry(), expirationTime: 60 },
    )
  })

  it("stores results under the mangled generated key", async () => {
    const getUser = region.cacheOnArguments({ namespace: "v2" })((id: number) => ({ id }), {
      name: "getUser",
      module: "users",
    })

    await getUser(5)

    expect(getUser.key(5)).toBe("users:getUser|v2|5")
    expect((await region.actualBackend.get(sha1MangleKey("users:getUser|v2|5"))).kind).toBe("hit")
  })

  it("uses a custom argument stringifier", () => {
    const memoize = region.cacheOnArguments({ toStr: (value) => JSON.stringify(value) })
    const search = memoize((term: string, page: number) => [term, page], { name: "search" })

    expect(search.key("tea", 2)).toBe('search|"tea" 2')
  })

  it("uses a custom key generator", () => {
    const prefixed: FunctionKeyGenerator = (_namespace, target) => (...args) =>
      `custom/${target.name}/${args.length}`
    const memoize = region.cacheOnArguments({ functionKeyGenerator: prefixed })

    expect(memoize((a: number, b: number) => a + b, { name: "add" }).key(1, 2)).toBe("custom/add/2")
  })

  it("uses the region's key generator by default", () => {
    const byName: FunctionKeyGenerator = (_namespace, target) => () => target.name
    const custom = createRegion({ logger: createNullLogger(), functionKeyGenerator: byName })

    const fn = custom.cacheOnArguments()((x: number) => x, { name: "plain" })

    expect(fn.key(1)).toBe("plain")
  })

  it("applies shouldCacheFn", async () => {
    let calls = 0
    const memoize = region.cacheOnArguments({ shouldCacheFn: (value) => value !== "skip" })
    const fn = memoize(
      (mode: string) => {
        calls++
        return mode
      },
      { name: "fn" },
    )

    await fn("skip")
    await fn("skip")
    await fn("keep")
    await fn("keep")

    expect(calls).toBe(3)
  })
})
