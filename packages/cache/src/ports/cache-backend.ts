import type { Logger } from "@regionkit/logger"
import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { CachedValue } from "./cached-value"
import type { KeyMangler } from "./key-mangler"
import type { Seconds } from "./time"
import type { TimeSource } from "./time-source"

/**
 * Storage seam behind a region.
 *
 * @remarks
 * Keys reaching a backend are already mangled. Bulk reads return one result
 * per requested key, in request order, with {@link NO_VALUE} for absent keys.
 * Deleting an absent key is not an error.
 */
export interface CacheBackend {
  /**
   * Mangler this backend prefers. Regions adopt it when they are configured
   * with this backend.
   */
  readonly keyMangler?: KeyMangler | undefined

  get(key: CacheKey): Promise<CacheResult<CachedValue>>

  getMulti(keys: readonly CacheKey[]): Promise<CacheResult<CachedValue>[]>

  set(key: CacheKey, value: CachedValue): Promise<void>

  setMulti(entries: readonly CacheEntry<CachedValue>[]): Promise<void>

  delete(key: CacheKey): Promise<void>

  deleteMulti(keys: readonly CacheKey[]): Promise<void>

  /** Releases connections or pools. Backends holding nothing may omit it. */
  close?(): Promise<void>
}

/**
 * Flat argument dictionary handed to a backend factory, i.e. the
 * `<prefix>.arguments.*` entries of a built cache config with the prefix
 * stripped. Values are strings when they came from `backendArgument`.
 */
export type BackendArguments = Readonly<Record<string, unknown>>

export type BackendContext = {
  logger: Logger

  clock: TimeSource

  /** The owning region's default expiration, `null` when it never expires. */
  expirationTime: Seconds | null
}

export type BackendFactory = (args: BackendArguments, context: BackendContext) => CacheBackend
