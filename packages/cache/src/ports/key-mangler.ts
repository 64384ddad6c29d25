import type { CacheKey } from "./cache-key"

/**
 * Deterministic key transform applied by a region before every backend call.
 */
export type KeyMangler = (key: CacheKey) => CacheKey
