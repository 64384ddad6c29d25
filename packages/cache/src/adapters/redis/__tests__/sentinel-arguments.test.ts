import { ConfigurationError } from "../../../core/errors"
import { reshapeSentinelArguments } from "../sentinel-arguments"

describe("reshapeSentinelArguments", () => {
  it("splits sentinels and moves credentials into both kwargs", () => {
    const reshaped = reshapeSentinelArguments({
      sentinels: "10.0.0.1:26379,10.0.0.2:26379",
      username: "u",
      password: "p",
    })

    expect(reshaped).toStrictEqual({
      sentinels: [
        ["10.0.0.1", 26379],
        ["10.0.0.2", 26379],
      ],
      connection_kwargs: { username: "u", password: "p" },
      sentinel_kwargs: { username: "u", password: "p" },
    })
  })

  it("gives each connection its own kwargs object", () => {
    const reshaped = reshapeSentinelArguments({ sentinels: "h:1", username: "u", password: "p" })

    expect(reshaped.connection_kwargs).not.toBe(reshaped.sentinel_kwargs)
  })

  it("splits each address on its last colon", () => {
    const reshaped = reshapeSentinelArguments({ sentinels: "fe80::1:26379" })

    expect(reshaped.sentinels).toStrictEqual([["fe80::1", 26379]])
  })

  it("adds TLS settings when ssl is truthy", () => {
    const reshaped = reshapeSentinelArguments({
      sentinels: "h:26379",
      username: "u",
      password: "p",
      ssl: "True",
      ssl_certfile: "/c.pem",
      ssl_keyfile: "/k.pem",
      ssl_ca_certs: "/ca.pem",
    })

    const expected = {
      username: "u",
      password: "p",
      ssl: true,
      ssl_certfile: "/c.pem",
      ssl_keyfile: "/k.pem",
      ssl_ca_certs: "/ca.pem",
    }
    expect(reshaped.connection_kwargs).toStrictEqual(expected)
    expect(reshaped.sentinel_kwargs).toStrictEqual(expected)
  })

  it("leaves TLS settings out when ssl is false", () => {
    const reshaped = reshapeSentinelArguments({
      sentinels: "h:26379",
      ssl: false,
      ssl_certfile: "/c.pem",
    })

    expect(reshaped.connection_kwargs).toStrictEqual({})
  })

  it("passes other arguments through and drops top-level credentials", () => {
    const reshaped = reshapeSentinelArguments({
      sentinels: "h:26379",
      username: "u",
      password: "p",
      service_name: "cache-master",
      db: "2",
      ssl: "false",
    })

    expect(Object.keys(reshaped).sort()).toStrictEqual([
      "connection_kwargs",
      "db",
      "sentinel_kwargs",
      "sentinels",
      "service_name",
      "ssl",
    ])
    expect(reshaped.service_name).toBe("cache-master")
    expect(reshaped.db).toBe("2")
  })

  it("rejects malformed sentinel addresses", () => {
    expect(() => reshapeSentinelArguments({ sentinels: "no-port" })).toThrow(ConfigurationError)
    expect(() => reshapeSentinelArguments({ sentinels: "h:port" })).toThrow(ConfigurationError)
  })

  it("requires sentinels", () => {
    expect(() => reshapeSentinelArguments({})).toThrow(ConfigurationError)
  })
})
