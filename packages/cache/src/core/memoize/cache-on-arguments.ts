import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { FunctionKeyGenerator } from "../keys/function-key-generator"
import type { ToStr } from "../keys/to-str"
import type { CacheRegion, ExpirationTime, ShouldCacheFn } from "../region/cache-region"

export type CacheOnArgumentsOptions = {
  namespace?: string
  expirationTime?: ExpirationTime
  shouldCacheFn?: ShouldCacheFn
  toStr?: ToStr
  functionKeyGenerator?: FunctionKeyGenerator
}

/**
 * How a memoized function is identified in its keys. `name` defaults to the
 * function's own `name`.
 */
export type MemoizeTarget = {
  name?: string
  module?: string
}

export type MemoizedFunction<A extends unknown[], R> = ((...args: A) => Promise<R>) & {
  /** The undecorated function. */
  readonly original: (...args: A) => R | Promise<R>

  /** Raw (unmangled) cache key for a set of arguments. */
  key(...args: A): CacheKey

  /** Reads the cached result without calling the function. */
  get(...args: A): Promise<CacheResult<R>>

  /** Stores `value` as the result for `args`. */
  set(value: R, ...args: A): Promise<void>

  /** Removes the cached result for `args`. */
  invalidate(...args: A): Promise<void>

  /** Calls the function and stores its result unconditionally. */
  refresh(...args: A): Promise<R>
}

export type CacheDecorator = <A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  target?: MemoizeTarget,
) => MemoizedFunction<A, R>

/**
 * Builds a decorator that caches a function's results in `region`, keyed by
 * its arguments.
 */
export function cacheOnArguments(
  region: CacheRegion,
  options: CacheOnArgumentsOptions = {},
): CacheDecorator {
  const generateFor = options.functionKeyGenerator ?? region.functionKeyGenerator

  return <A extends unknown[], R>(
    fn: (...args: A) => R | Promise<R>,
    target: MemoizeTarget = {},
  ): MemoizedFunction<A, R> => {
    const keyFor = generateFor<A>(
      options.namespace,
      { name: target.name ?? fn.name, module: target.module },
      options.toStr,
    )

    const memoized = (...args: A): Promise<R> =>
      region.getOrCreate<R>(keyFor(...args), () => fn(...args), {
        expirationTime: options.expirationTime,
        shouldCacheFn: options.shouldCacheFn,
      })

    return Object.assign(memoized, {
      original: fn,
      key: (...args: A): CacheKey => keyFor(...args),
      get: (...args: A): Promise<CacheResult<R>> =>
        region.get<R>(keyFor(...args), {
          expirationTime:
            typeof options.expirationTime === "function"
              ? options.expirationTime()
              : options.expirationTime,
        }),
      set: (value: R, ...args: A): Promise<void> => region.set(keyFor(...args), value),
      invalidate: (...args: A): Promise<void> => region.delete(keyFor(...args)),
      refresh: async (...args: A): Promise<R> => {
        const value = await fn(...args)
        await region.set(keyFor(...args), value)
        return value
      },
    })
  }
}
