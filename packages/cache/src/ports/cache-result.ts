export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss

/**
 * The "no value" marker returned for absent or expired keys.
 *
 * A stored `null` or `undefined` is a hit carrying that value, so callers
 * must compare `kind`, never the value itself.
 */
export const NO_VALUE: CacheMiss = Object.freeze<CacheMiss>({ kind: "miss" })

export function isNoValue<T>(result: CacheResult<T>): result is CacheMiss {
  return result.kind === "miss"
}
