import { readFileSync } from "node:fs"
import { createClient, createSentinel, RESP_TYPES } from "redis"

export type RedisTtl = { EX?: number }

/**
 * Minimal Redis surface the backend relies on, with bulk strings mapped to
 * `Buffer`. Satisfied by both standalone and sentinel-managed clients.
 */
export interface RedisCacheClient {
  readonly isOpen: boolean

  connect(): Promise<unknown>

  close(): Promise<unknown>

  get(key: string): Promise<Buffer | null>

  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): Promise<unknown>

  del(keys: string | readonly string[]): Promise<number>

  multi(): {
    set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): unknown
    exec(): Promise<unknown>
  }
}

export type RedisTlsFiles = {
  certFile?: string | undefined
  keyFile?: string | undefined
  caFile?: string | undefined
}

export type RedisNodeConnectOptions = {
  username?: string | undefined
  password?: string | undefined
  database?: number | undefined
  connectTimeoutMs?: number | undefined

  /** PEM files read when the client is created; `undefined` disables TLS. */
  tls?: RedisTlsFiles | undefined
}

export type RedisSentinelConnectOptions = {
  /** Monitored master name. */
  name: string
  sentinelRootNodes: { host: string; port: number }[]
  nodeClientOptions: RedisNodeConnectOptions
  sentinelClientOptions: RedisNodeConnectOptions
}

export function createRedisCacheClient(url: string): RedisCacheClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisCacheClient
}

function readPem(path: string | undefined): Buffer | undefined {
  return path === undefined ? undefined : readFileSync(path)
}

function nodeOptions(opts: RedisNodeConnectOptions) {
  return {
    username: opts.username,
    password: opts.password,
    database: opts.database,
    socket: opts.tls
      ? {
          tls: true as const,
          cert: readPem(opts.tls.certFile),
          key: readPem(opts.tls.keyFile),
          ca: readPem(opts.tls.caFile),
          connectTimeout: opts.connectTimeoutMs,
        }
      : { connectTimeout: opts.connectTimeoutMs },
  }
}

export function createRedisSentinelCacheClient(opts: RedisSentinelConnectOptions): RedisCacheClient {
  return createSentinel({
    name: opts.name,
    sentinelRootNodes: opts.sentinelRootNodes,
    nodeClientOptions: nodeOptions(opts.nodeClientOptions),
    sentinelClientOptions: nodeOptions(opts.sentinelClientOptions),
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisCacheClient
}
