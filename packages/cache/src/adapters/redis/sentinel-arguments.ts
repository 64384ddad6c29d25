import { z } from "zod"
import { booleanArgument, parseBackendArguments } from "../../core/arguments/parse-backend-arguments"
import { ConfigurationError } from "../../core/errors"
import { BACKEND_NAMES } from "../../core/registry/backend-names"
import type { BackendArguments } from "../../ports/cache-backend"

export type SentinelAddress = readonly [host: string, port: number]

/** Connection settings shared by the master/replica and sentinel connections. */
export type SentinelConnectionKwargs = {
  username?: string
  password?: string
  ssl?: boolean
  ssl_certfile?: string
  ssl_keyfile?: string
  ssl_ca_certs?: string
}

export type ReshapedSentinelArguments = Record<string, unknown> & {
  sentinels: SentinelAddress[]
  connection_kwargs: SentinelConnectionKwargs
  sentinel_kwargs: SentinelConnectionKwargs
}

const sentinelArgumentsSchema = z.object({
  sentinels: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  ssl: booleanArgument.optional(),
  ssl_certfile: z.string().optional(),
  ssl_keyfile: z.string().optional(),
  ssl_ca_certs: z.string().optional(),
})

function parseSentinels(value: string): SentinelAddress[] {
  return value.split(",").map((pair) => {
    const address = pair.trim()
    const separator = address.lastIndexOf(":")
    const port = Number(address.slice(separator + 1))

    if (separator <= 0 || !Number.isInteger(port) || port <= 0) {
      throw new ConfigurationError(`Invalid sentinel address "${address}", expected <host>:<port>`, {
        context: { backend: BACKEND_NAMES.redisSentinel },
      })
    }

    return [address.slice(0, separator), port] as const
  })
}

/**
 * Rewrites flat sentinel arguments into the shape the sentinel client needs.
 *
 * - `sentinels` ("host:port,host:port") becomes a list of address tuples,
 *   split on the last colon of each entry.
 * - `username`/`password` move into `connection_kwargs` and
 *   `sentinel_kwargs`; with a truthy `ssl` the TLS settings join them.
 * - Every other argument passes through unchanged.
 */
export function reshapeSentinelArguments(args: BackendArguments): ReshapedSentinelArguments {
  const parsed = parseBackendArguments(BACKEND_NAMES.redisSentinel, sentinelArgumentsSchema, args)
  const { username: _username, password: _password, ...rest } = args

  const kwargs = (): SentinelConnectionKwargs => ({
    ...(parsed.username !== undefined && { username: parsed.username }),
    ...(parsed.password !== undefined && { password: parsed.password }),
    ...(parsed.ssl === true && {
      ssl: true,
      ...(parsed.ssl_certfile !== undefined && { ssl_certfile: parsed.ssl_certfile }),
      ...(parsed.ssl_keyfile !== undefined && { ssl_keyfile: parsed.ssl_keyfile }),
      ...(parsed.ssl_ca_certs !== undefined && { ssl_ca_certs: parsed.ssl_ca_certs }),
    }),
  })

  return {
    ...rest,
    sentinels: parseSentinels(parsed.sentinels),
    connection_kwargs: kwargs(),
    sentinel_kwargs: kwargs(),
  }
}
