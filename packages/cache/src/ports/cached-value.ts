import type { Milliseconds } from "./time"

export const CACHED_VALUE_VERSION = 1

export type CachedValueMetadata = {
  /** Creation time, epoch milliseconds. */
  ct: Milliseconds

  /** Envelope version; entries written under another version read as misses. */
  v: number
}

/**
 * What regions hand to backends: the caller's value plus the metadata the
 * region needs to judge freshness on the way back out.
 */
export type CachedValue<T = unknown> = {
  payload: T
  metadata: CachedValueMetadata
}
