import { ConfigurationError } from "../../../core/errors"
import { reshapePooledMemcacheArguments } from "../pooled-memcache-arguments"

describe("reshapePooledMemcacheArguments", () => {
  it("applies defaults when nothing is given", () => {
    expect(reshapePooledMemcacheArguments({})).toStrictEqual({
      servers: ["localhost:11211"],
      client: { socketTimeout: 3, deadRetry: 300 },
      pool: { max: 10, idleTimeoutMillis: 60_000, acquireTimeoutMillis: 10_000 },
      expirationTime: 0,
    })
  })

  it("splits a comma-separated url and trims entries", () => {
    const settings = reshapePooledMemcacheArguments({ url: "a:11211, b:11211,," })

    expect(settings.servers).toStrictEqual(["a:11211", "b:11211"])
  })

  it("accepts a server list as built from memcache options", () => {
    const settings = reshapePooledMemcacheArguments({ url: ["a:1", "b:2"] })

    expect(settings.servers).toStrictEqual(["a:1", "b:2"])
  })

  it("coerces string values and converts pool timeouts to milliseconds", () => {
    const settings = reshapePooledMemcacheArguments({
      dead_retry: "15",
      socket_timeout: "0.5",
      pool_maxsize: "4",
      pool_unused_timeout: "30",
      pool_connection_get_timeout: "2",
      memcache_expire_time: "90",
    })

    expect(settings).toStrictEqual({
      servers: ["localhost:11211"],
      client: { socketTimeout: 0.5, deadRetry: 15 },
      pool: { max: 4, idleTimeoutMillis: 30_000, acquireTimeoutMillis: 2_000 },
      expirationTime: 90,
    })
  })

  it("rejects a pool size that is not a positive integer", () => {
    expect(() => reshapePooledMemcacheArguments({ pool_maxsize: "many" })).toThrow(ConfigurationError)
    expect(() => reshapePooledMemcacheArguments({ pool_maxsize: "0" })).toThrow(ConfigurationError)
  })
})
