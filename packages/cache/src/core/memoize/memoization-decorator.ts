import type { Seconds } from "../../ports/time"
import type { CacheConfig } from "../config/cache-config.schema"
import type { CacheRegion } from "../region/cache-region"
import type { CacheDecorator } from "./cache-on-arguments"

export type MemoizationDecorator = CacheDecorator & {
  /** Whether a result may be stored, read from config on every call. */
  readonly shouldCache: (value: unknown) => boolean

  /** Group cache time in seconds, or `null` for the region default. */
  readonly getExpirationTime: () => Seconds | null
}

export function createShouldCacheFn(config: CacheConfig, group: string): (value: unknown) => boolean {
  return () => {
    if (!config.cache.enabled) return false
    return config.groups[group]?.caching ?? true
  }
}

export function createExpirationTimeFn(config: CacheConfig, group: string): () => Seconds | null {
  return () => config.groups[group]?.cacheTime ?? null
}

/**
 * Memoization decorator for one config group.
 *
 * Results are stored only while `cache.enabled` and the group's `caching`
 * are both on; the group's `cacheTime` overrides the region expiration.
 * `expirationGroup` takes the cache time from another group.
 *
 * @example
 * ```ts
 * const memoize = getMemoizationDecorator(config, region, "catalog")
 * const getProduct = memoize(async (id: string) => loadProduct(id), { module: "catalog" })
 * ```
 */
export function getMemoizationDecorator(
  config: CacheConfig,
  region: CacheRegion,
  group: string,
  expirationGroup?: string | null,
): MemoizationDecorator {
  const shouldCache = createShouldCacheFn(config, group)
  const getExpirationTime = createExpirationTimeFn(config, expirationGroup ?? group)

  const decorator = region.cacheOnArguments({
    shouldCacheFn: shouldCache,
    expirationTime: getExpirationTime,
  })

  return Object.assign(decorator, { shouldCache, getExpirationTime })
}
