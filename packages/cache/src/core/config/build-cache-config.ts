import type { Logger } from "@regionkit/logger"
import type { CacheOptions } from "./cache-config.schema"

/**
 * Flat dictionary a region is configured from:
 *
 * - `<prefix>.backend`
 * - `<prefix>.expiration_time`
 * - `<prefix>.arguments.<argname>` for every backend argument
 */
export type CacheConfigDict = Record<string, unknown>

function memcacheDefaults(options: CacheOptions): readonly (readonly [string, unknown])[] {
  return [
    ["url", [...options.memcacheServers]],
    ["dead_retry", options.memcacheDeadRetry],
    ["socket_timeout", options.memcacheSocketTimeout],
    ["pool_maxsize", options.memcachePoolMaxsize],
    ["pool_unused_timeout", options.memcachePoolUnusedTimeout],
    ["pool_connection_get_timeout", options.memcachePoolConnectionGetTimeout],
  ]
}

/**
 * Flattens cache options into a {@link CacheConfigDict}.
 *
 * Each `backendArgument` is split on its first colon, so values may contain
 * colons themselves. Entries without one are logged and skipped. Memcache
 * options fill in `arguments.*` keys the explicit arguments left unset.
 */
export function buildCacheConfig(options: CacheOptions, logger: Logger): CacheConfigDict {
  const prefix = options.configPrefix
  const conf: CacheConfigDict = {
    [`${prefix}.backend`]: options.backend,
    [`${prefix}.expiration_time`]: options.expirationTime,
  }

  for (const argument of options.backendArgument) {
    const separator = argument.indexOf(":")

    if (separator === -1) {
      logger.error(
        'Unable to build cache config-key. Expected format "<argname>:<value>". Skipping unknown format',
        { argument },
      )
      continue
    }

    conf[`${prefix}.arguments.${argument.slice(0, separator)}`] = argument.slice(separator + 1)
  }

  for (const [name, value] of memcacheDefaults(options)) {
    const key = `${prefix}.arguments.${name}`
    if (!(key in conf)) conf[key] = value
  }

  logger.debug("Built cache config", { config: conf })

  return conf
}
