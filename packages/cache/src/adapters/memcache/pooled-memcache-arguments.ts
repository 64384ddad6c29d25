import { z } from "zod"
import {
  listArgument,
  numberArgument,
  parseBackendArguments,
} from "../../core/arguments/parse-backend-arguments"
import { BACKEND_NAMES } from "../../core/registry/backend-names"
import type { BackendArguments } from "../../ports/cache-backend"
import type { Milliseconds, Seconds } from "../../ports/time"

const pooledMemcacheArgumentsSchema = z.object({
  url: listArgument.default(() => ["localhost:11211"]),
  dead_retry: numberArgument.nonnegative().default(300),
  socket_timeout: numberArgument.positive().default(3),
  pool_maxsize: numberArgument.int().positive().default(10),
  pool_unused_timeout: numberArgument.nonnegative().default(60),
  pool_connection_get_timeout: numberArgument.positive().default(10),
  memcache_expire_time: numberArgument.int().nonnegative().default(0),
})

export type PooledMemcacheSettings = {
  servers: string[]

  client: {
    socketTimeout: Seconds
    deadRetry: Seconds
  }

  pool: {
    max: number
    idleTimeoutMillis: Milliseconds
    acquireTimeoutMillis: Milliseconds
  }

  /** Server-side expiry for every write; `0` means none. */
  expirationTime: Seconds
}

/**
 * Turns flat `memcache_pool` arguments into client, pool and write settings.
 * Timeouts are given in seconds and converted for the pool.
 */
export function reshapePooledMemcacheArguments(args: BackendArguments): PooledMemcacheSettings {
  const parsed = parseBackendArguments(
    BACKEND_NAMES.memcachePool,
    pooledMemcacheArgumentsSchema,
    args,
  )

  return {
    servers: parsed.url,
    client: {
      socketTimeout: parsed.socket_timeout,
      deadRetry: parsed.dead_retry,
    },
    pool: {
      max: parsed.pool_maxsize,
      idleTimeoutMillis: parsed.pool_unused_timeout * 1000,
      acquireTimeoutMillis: parsed.pool_connection_get_timeout * 1000,
    },
    expirationTime: parsed.memcache_expire_time,
  }
}
