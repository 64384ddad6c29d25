import { Client } from "memjs"
import type { Seconds } from "../../ports/time"

/**
 * The slice of a memcached client the pooled backend uses.
 */
export interface MemcacheClient {
  get(key: string): Promise<Uint8Array | null>

  /** `expires` of `0` stores without expiry. */
  set(key: string, value: Uint8Array, expires: Seconds): Promise<void>

  delete(key: string): Promise<void>

  close(): void
}

export type MemcacheClientOptions = {
  servers: readonly string[]

  /** Per-operation socket timeout. */
  socketTimeout: Seconds

  /** How long a failed server stays marked dead. */
  deadRetry: Seconds
}

export function createMemjsClient(opts: MemcacheClientOptions): MemcacheClient {
  const client = Client.create(opts.servers.join(","), {
    timeout: opts.socketTimeout,
    failover: opts.servers.length > 1,
    failoverTime: opts.deadRetry,
  })

  return {
    async get(key) {
      const { value } = await client.get(key)
      return value
    },
    async set(key, value, expires) {
      await client.set(key, Buffer.from(value), { expires })
    },
    async delete(key) {
      await client.delete(key)
    },
    close() {
      client.quit()
    },
  }
}
