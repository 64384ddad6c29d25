import { z } from "zod"
import { ConfigurationError } from "../errors"
import { BACKEND_NAMES } from "../registry/backend-names"

export const cacheOptionsSchema = z.object({
  /** Prefix of every key in the built config dictionary. */
  configPrefix: z.string().min(1).default("cache"),

  /** Registered backend name. */
  backend: z.string().min(1).default(BACKEND_NAMES.noop),

  /** Region default expiration in seconds. */
  expirationTime: z.number().int().positive().default(600),

  /** `<argname>:<value>` strings handed to the backend. */
  backendArgument: z.array(z.string()).default(() => []),

  /** Registered proxy names, wrapped in order. */
  proxies: z.array(z.string()).default(() => []),

  debugCacheBackend: z.boolean().default(false),

  /** Global switch consulted by memoization decorators. */
  enabled: z.boolean().default(false),

  // Pooled memcache settings. Explicit backendArgument entries win.
  memcacheServers: z.array(z.string()).default(() => ["localhost:11211"]),
  memcacheDeadRetry: z.number().int().nonnegative().default(300),
  memcacheSocketTimeout: z.number().positive().default(3),
  memcachePoolMaxsize: z.number().int().positive().default(10),
  memcachePoolUnusedTimeout: z.number().int().nonnegative().default(60),
  memcachePoolConnectionGetTimeout: z.number().int().positive().default(10),
})

export const cacheGroupOptionsSchema = z.object({
  /** Per-group switch, only consulted when caching is enabled globally. */
  caching: z.boolean().default(true),

  /** Seconds, or `null` for the region default. */
  cacheTime: z.number().int().nullable().default(null),
})

export const cacheConfigSchema = z.object({
  cache: cacheOptionsSchema.prefault({}),
  groups: z.record(z.string(), cacheGroupOptionsSchema).default(() => ({})),
})

export type CacheOptions = z.infer<typeof cacheOptionsSchema>
export type CacheGroupOptions = z.infer<typeof cacheGroupOptionsSchema>
export type CacheConfig = z.infer<typeof cacheConfigSchema>
export type CacheConfigInput = z.input<typeof cacheConfigSchema>

export function parseCacheConfig(raw: unknown): CacheConfig {
  const result = cacheConfigSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigurationError(`Invalid cache configuration:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }

  return result.data
}
