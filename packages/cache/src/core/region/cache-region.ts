import { createPinoLogger, type Logger } from "@regionkit/logger"
import type { BackendArguments, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheResult, isNoValue, NO_VALUE } from "../../ports/cache-result"
import { CACHED_VALUE_VERSION, type CachedValue } from "../../ports/cached-value"
import type { KeyMangler } from "../../ports/key-mangler"
import type { Milliseconds, Seconds } from "../../ports/time"
import type { TimeSource } from "../../ports/time-source"
import type { CacheConfigDict } from "../config/build-cache-config"
import { ConfigurationError } from "../errors"
import { type FunctionKeyGenerator, functionKeyGenerator } from "../keys/function-key-generator"
import { sha1MangleKey } from "../keys/sha1-mangle-key"
import {
  type CacheDecorator,
  type CacheOnArgumentsOptions,
  cacheOnArguments,
} from "../memoize/cache-on-arguments"
import type { BackendRegistry } from "../registry/backend-registry"
import { systemClock } from "../time/clock"
import type { ProxyBackend } from "./proxy-backend"

/** Seconds, `null` or `-1` for "never", or a function read on every call. */
export type ExpirationTime = Seconds | null | (() => Seconds | null)

export type ShouldCacheFn = (value: unknown) => boolean

export type RegionOptions = {
  name?: string
  functionKeyGenerator?: FunctionKeyGenerator
  logger?: Logger
  clock?: TimeSource
}

export type RegionConfigureOptions = {
  registry: BackendRegistry

  /** Region default in seconds; `null` or `-1` disables expiry. */
  expirationTime?: Seconds | null

  /** Backend arguments, without any prefix. */
  arguments?: BackendArguments
}

export type RegionGetOptions = {
  /** Overrides the region default for this read; `null` keeps the default. */
  expirationTime?: Seconds | null

  /** Return values regardless of age. Hard invalidation still applies. */
  ignoreExpiration?: boolean
}

export type GetOrCreateOptions = {
  expirationTime?: ExpirationTime
  shouldCacheFn?: ShouldCacheFn
}

const NEVER_EXPIRES = -1

function resolveExpiration(expirationTime: ExpirationTime | undefined): Seconds | null {
  if (typeof expirationTime === "function") return expirationTime()
  return expirationTime ?? null
}

/**
 * A named cache front-end bound to one backend, optionally behind a chain of
 * proxies.
 *
 * @remarks
 * Values are stored wrapped in a {@link CachedValue} envelope carrying their
 * creation time. Expiry is judged by the region on read, so a backend that
 * keeps an entry longer than the region default does no harm.
 *
 * A region is created unconfigured; every cache operation before
 * {@link CacheRegion.configure} throws {@link ConfigurationError}.
 */
export class CacheRegion {
  readonly name: string
  readonly functionKeyGenerator: FunctionKeyGenerator
  readonly logger: Logger

  /** Applied to every key before it reaches the backend; `null` disables mangling. */
  keyMangler: KeyMangler | null = null

  expirationTime: Seconds | null = null

  private readonly clock: TimeSource
  private readonly applied: ProxyBackend[] = []
  private actual: CacheBackend | undefined
  private current: CacheBackend | undefined
  private hardInvalidatedAtMs: Milliseconds | undefined

  constructor(options: RegionOptions = {}) {
    this.name = options.name ?? "default"
    this.functionKeyGenerator = options.functionKeyGenerator ?? functionKeyGenerator
    this.clock = options.clock ?? systemClock
    this.logger = (options.logger ?? createPinoLogger({}, {}, { module: "regionkit.cache" })).child({
      region: this.name,
    })
  }

  get isConfigured(): boolean {
    return this.current !== undefined
  }

  /** Outermost layer: the last proxy wrapped, or the backend itself. */
  get backend(): CacheBackend {
    return this.requireBackend()
  }

  /** The backend the region was configured with, under all proxies. */
  get actualBackend(): CacheBackend {
    if (this.actual === undefined) return this.requireBackend()
    return this.actual
  }

  get proxies(): readonly ProxyBackend[] {
    return [...this.applied]
  }

  configure(backendName: string, options: RegionConfigureOptions): this {
    if (this.current !== undefined) {
      this.logger.debug("Region already configured, ignoring", { backend: backendName })
      return this
    }

    const factory = options.registry.resolve(backendName)
    const expirationTime = options.expirationTime ?? null

    let backend: CacheBackend
    try {
      backend = factory(options.arguments ?? {}, {
        logger: this.logger.child({ backend: backendName }),
        clock: this.clock,
        expirationTime,
      })
    } catch (err) {
      if (err instanceof ConfigurationError) throw err

      throw new ConfigurationError(`Unable to create cache backend "${backendName}"`, {
        context: { backend: backendName, region: this.name },
        cause: err,
      })
    }

    this.actual = backend
    this.current = backend
    this.expirationTime = expirationTime
    this.keyMangler = backend.keyMangler ?? sha1MangleKey

    this.logger.info("Cache region configured", { backend: backendName, expirationTime })

    return this
  }

  /**
   * Configures from a built config dictionary: `<prefix>backend`,
   * `<prefix>expiration_time` and every `<prefix>arguments.<name>`.
   */
  configureFromConfig(
    config: CacheConfigDict,
    prefix: string,
    registry: BackendRegistry,
  ): this {
    const backendName = config[`${prefix}backend`]

    if (typeof backendName !== "string") {
      throw new ConfigurationError(`Missing "${prefix}backend" in cache config`, {
        context: { region: this.name },
      })
    }

    const argumentPrefix = `${prefix}arguments.`
    const args: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(config)) {
      if (key.startsWith(argumentPrefix)) args[key.slice(argumentPrefix.length)] = value
    }

    return this.configure(backendName, {
      registry,
      expirationTime: this.readExpiration(config[`${prefix}expiration_time`], prefix),
      arguments: args,
    })
  }

  /**
   * Puts `proxy` in front of the current backend. Proxies wrap in call order,
   * so the last one wrapped sees each call first.
   */
  wrap(proxy: ProxyBackend): this {
    this.current = proxy.wrap(this.requireBackend())
    this.applied.push(proxy)
    return this
  }

  async get<T = unknown>(key: CacheKey, options: RegionGetOptions = {}): Promise<CacheResult<T>> {
    const result = await this.requireBackend().get(this.mangle(key))
    return this.unwrap<T>(result, options)
  }

  async getMulti<T = unknown>(
    keys: readonly CacheKey[],
    options: RegionGetOptions = {},
  ): Promise<CacheResult<T>[]> {
    const backend = this.requireBackend()
    if (keys.length === 0) return []

    const results = await backend.getMulti(keys.map((key) => this.mangle(key)))
    return results.map((result) => this.unwrap<T>(result, options))
  }

  async set(key: CacheKey, value: unknown): Promise<void> {
    await this.requireBackend().set(this.mangle(key), this.envelope(value))
  }

  async setMulti(mapping: ReadonlyMap<CacheKey, unknown>): Promise<void> {
    const backend = this.requireBackend()
    if (mapping.size === 0) return

    const entries: CacheEntry<CachedValue>[] = []
    for (const [key, value] of mapping) {
      entries.push([this.mangle(key), this.envelope(value)])
    }

    await backend.setMulti(entries)
  }

  async delete(key: CacheKey): Promise<void> {
    await this.requireBackend().delete(this.mangle(key))
  }

  async deleteMulti(keys: readonly CacheKey[]): Promise<void> {
    const backend = this.requireBackend()
    if (keys.length === 0) return

    await backend.deleteMulti(keys.map((key) => this.mangle(key)))
  }

  /**
   * Returns the cached value for `key`, or runs `creator` and stores its
   * result unless `shouldCacheFn` rejects it.
   */
  async getOrCreate<T>(
    key: CacheKey,
    creator: () => T | Promise<T>,
    options: GetOrCreateOptions = {},
  ): Promise<T> {
    const cached = await this.get<T>(key, {
      expirationTime: resolveExpiration(options.expirationTime),
    })
    if (cached.kind === "hit") return cached.value

    const value = await creator()

    if (options.shouldCacheFn === undefined || options.shouldCacheFn(value)) {
      await this.set(key, value)
    }

    return value
  }

  /**
   * Treats everything written before now as absent, without touching the
   * backend.
   */
  invalidate(): void {
    this.hardInvalidatedAtMs = this.clock.nowMs()
  }

  cacheOnArguments(options: CacheOnArgumentsOptions = {}): CacheDecorator {
    return cacheOnArguments(this, options)
  }

  async close(): Promise<void> {
    await this.current?.close?.()
  }

  private requireBackend(): CacheBackend {
    if (this.current === undefined) {
      throw new ConfigurationError(`Cache region "${this.name}" is not configured`, {
        context: { region: this.name },
      })
    }

    return this.current
  }

  private mangle(key: CacheKey): CacheKey {
    return this.keyMangler === null ? key : this.keyMangler(key)
  }

  private envelope(payload: unknown): CachedValue {
    return { payload, metadata: { ct: this.clock.nowMs(), v: CACHED_VALUE_VERSION } }
  }

  private unwrap<T>(result: CacheResult<CachedValue>, options: RegionGetOptions): CacheResult<T> {
    if (isNoValue(result) || !this.isFresh(result.value, options)) return NO_VALUE

    // A key only ever holds what its typed caller wrote under it.
    return { kind: "hit", value: result.value.payload as T }
  }

  private isFresh(value: CachedValue, options: RegionGetOptions): boolean {
    const { ct, v } = value.metadata

    if (v !== CACHED_VALUE_VERSION) return false
    if (this.hardInvalidatedAtMs !== undefined && ct < this.hardInvalidatedAtMs) return false
    if (options.ignoreExpiration === true) return true

    const expirationTime = options.expirationTime ?? this.expirationTime
    if (expirationTime === null || expirationTime === NEVER_EXPIRES) return true

    return this.clock.nowMs() - ct <= expirationTime * 1000
  }

  private readExpiration(value: unknown, prefix: string): Seconds | null {
    if (value === undefined || value === null) return null

    const seconds = typeof value === "number" ? value : Number(value)

    if (!Number.isFinite(seconds)) {
      throw new ConfigurationError(`"${prefix}expiration_time" must be a number of seconds`, {
        context: { region: this.name },
      })
    }

    return seconds
  }
}

export function createRegion(options: RegionOptions = {}): CacheRegion {
  return new CacheRegion(options)
}
