export { DictCacheBackend, type DictCacheBackendDeps, type DictCacheBackendOptions, createDictBackend } from "./adapters/dict/dict-backend"
export { createMemjsClient, type MemcacheClient, type MemcacheClientOptions } from "./adapters/memcache/memcache-client"
export { type PooledMemcacheSettings, reshapePooledMemcacheArguments } from "./adapters/memcache/pooled-memcache-arguments"
export {
  createPooledMemcacheBackend,
  createPooledMemcacheBackendFactory,
  PooledMemcacheBackend,
  type PooledMemcacheBackendDeps,
  type PooledMemcacheBackendOptions,
  type PooledMemcacheFactoryDeps,
} from "./adapters/memcache/pooled-memcache-backend"
export {
  createMongoBackend,
  createMongoBackendFactory,
  MongoCacheBackend,
  type MongoBackendFactoryDeps,
  type MongoCacheBackendDeps,
  type MongoCacheBackendOptions,
} from "./adapters/mongo/mongo-backend"
export {
  createMongoCacheCollection,
  type MongoCacheCollection,
  type MongoConnectionSettings,
} from "./adapters/mongo/mongo-cache-collection"
export { createNoopBackend, NoopCacheBackend } from "./adapters/noop/noop-backend"
export {
  createRedisBackend,
  createRedisBackendFactory,
  createRedisSentinelBackend,
  createRedisSentinelBackendFactory,
  RedisCacheBackend,
  type RedisBackendFactoryDeps,
  type RedisCacheBackendDeps,
  type RedisCacheBackendOptions,
  type RedisSentinelBackendFactoryDeps,
} from "./adapters/redis/redis-backend"
export {
  createRedisCacheClient,
  createRedisSentinelCacheClient,
  type RedisCacheClient,
  type RedisNodeConnectOptions,
  type RedisSentinelConnectOptions,
} from "./adapters/redis/redis-client"
export {
  type ReshapedSentinelArguments,
  reshapeSentinelArguments,
  type SentinelAddress,
  type SentinelConnectionKwargs,
} from "./adapters/redis/sentinel-arguments"
export { createSuperJsonCodec } from "./core/codec/superjson-codec"
export { buildCacheConfig, type CacheConfigDict } from "./core/config/build-cache-config"
export {
  type CacheConfig,
  type CacheConfigInput,
  cacheConfigSchema,
  type CacheGroupOptions,
  cacheGroupOptionsSchema,
  type CacheOptions,
  cacheOptionsSchema,
  parseCacheConfig,
} from "./core/config/cache-config.schema"
export { ConfigurationError, type ConfigurationErrorCode, UnknownBackendError } from "./core/errors"
export {
  type FunctionKeyGenerator,
  functionKeyGenerator,
  generateKey,
  type KeyGenerator,
  type KeyTarget,
} from "./core/keys/function-key-generator"
export { escapeNonAscii, sha1MangleKey } from "./core/keys/sha1-mangle-key"
export { keyGenerateToStr, type ToStr } from "./core/keys/to-str"
export {
  type CacheDecorator,
  type CacheOnArgumentsOptions,
  cacheOnArguments,
  type MemoizedFunction,
  type MemoizeTarget,
} from "./core/memoize/cache-on-arguments"
export {
  createExpirationTimeFn,
  createShouldCacheFn,
  getMemoizationDecorator,
  type MemoizationDecorator,
} from "./core/memoize/memoization-decorator"
export {
  CacheRegion,
  createRegion,
  type ExpirationTime,
  type GetOrCreateOptions,
  type RegionConfigureOptions,
  type RegionGetOptions,
  type RegionOptions,
  type ShouldCacheFn,
} from "./core/region/cache-region"
export { configureCacheRegion, type ConfigureCacheRegionDeps } from "./core/region/configure-cache-region"
export { DebugProxy } from "./core/region/debug-proxy"
export { ProxyBackend } from "./core/region/proxy-backend"
export { BACKEND_NAMES, type BuiltinBackendName } from "./core/registry/backend-names"
export { BackendRegistry, type ProxyFactory } from "./core/registry/backend-registry"
export { createDefaultRegistry, registerBuiltinBackends } from "./core/registry/builtin-backends"
export { SystemClock, systemClock } from "./core/time/clock"
export type { BackendArguments, BackendContext, BackendFactory, CacheBackend } from "./ports/cache-backend"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export { type CacheHit, type CacheMiss, type CacheResult, isNoValue, NO_VALUE } from "./ports/cache-result"
export { CACHED_VALUE_VERSION, type CachedValue, type CachedValueMetadata } from "./ports/cached-value"
export type { Codec } from "./ports/codec"
export type { KeyMangler } from "./ports/key-mangler"
export type { Milliseconds, Seconds } from "./ports/time"
export type { TimeSource } from "./ports/time-source"
