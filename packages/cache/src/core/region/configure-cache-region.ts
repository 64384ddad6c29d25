import type { Logger } from "@regionkit/logger"
import { buildCacheConfig } from "../config/build-cache-config"
import type { CacheConfig } from "../config/cache-config.schema"
import { ConfigurationError } from "../errors"
import type { BackendRegistry } from "../registry/backend-registry"
import { createDefaultRegistry } from "../registry/builtin-backends"
import { CacheRegion } from "./cache-region"
import { DebugProxy } from "./debug-proxy"

export type ConfigureCacheRegionDeps = {
  /** Defaults to a registry holding the built-in backends. */
  registry?: BackendRegistry

  /** Defaults to the region's logger. */
  logger?: Logger
}

/**
 * Configures `region` from the `cache` options of `config`.
 *
 * Builds the config dictionary, configures the backend, then wraps the debug
 * proxy (when `debugCacheBackend` is set) followed by each named proxy in
 * list order. Already-configured regions are returned untouched.
 */
export function configureCacheRegion(
  config: CacheConfig,
  region: unknown,
  deps: ConfigureCacheRegionDeps = {},
): CacheRegion {
  if (!(region instanceof CacheRegion)) {
    throw new ConfigurationError(`Region is not a CacheRegion: ${describe(region)}`)
  }

  if (region.isConfigured) return region

  const logger = deps.logger ?? region.logger
  const registry = deps.registry ?? createDefaultRegistry()
  const options = config.cache

  region.configureFromConfig(buildCacheConfig(options, logger), `${options.configPrefix}.`, registry)

  if (options.debugCacheBackend) {
    region.wrap(new DebugProxy(logger))
  }

  for (const name of options.proxies) {
    logger.debug("Adding cache proxy to backend", { proxy: name })
    region.wrap(registry.resolveProxy(name)())
  }

  return region
}

function describe(value: unknown): string {
  return Object.prototype.toString.call(value)
}
