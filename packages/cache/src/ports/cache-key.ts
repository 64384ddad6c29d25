/**
 * Keys are plain strings at every layer.
 *
 * @remarks
 * Region callers hand over the raw key (for memoized functions, the output of
 * the function key generator). The region runs it through its key mangler, if
 * any, before a backend ever sees it, so backends treat keys as opaque.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.lookup:getUser|42"
 * ```
 */
export type CacheKey = string
