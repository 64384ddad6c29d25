import { createDictBackend } from "../../adapters/dict/dict-backend"
import { createPooledMemcacheBackend } from "../../adapters/memcache/pooled-memcache-backend"
import { createMongoBackend } from "../../adapters/mongo/mongo-backend"
import { createNoopBackend } from "../../adapters/noop/noop-backend"
import { createRedisBackend, createRedisSentinelBackend } from "../../adapters/redis/redis-backend"
import { BACKEND_NAMES } from "./backend-names"
import { BackendRegistry } from "./backend-registry"

/**
 * Registers every backend shipped with the package under its
 * `regionkit.*` name. Safe to call more than once.
 */
export function registerBuiltinBackends(registry: BackendRegistry): BackendRegistry {
  return registry
    .register(BACKEND_NAMES.noop, createNoopBackend)
    .register(BACKEND_NAMES.mongo, createMongoBackend)
    .register(BACKEND_NAMES.memcachePool, createPooledMemcacheBackend)
    .register(BACKEND_NAMES.dict, createDictBackend)
    .register(BACKEND_NAMES.redis, createRedisBackend)
    .register(BACKEND_NAMES.redisSentinel, createRedisSentinelBackend)
}

export function createDefaultRegistry(): BackendRegistry {
  return registerBuiltinBackends(new BackendRegistry())
}
