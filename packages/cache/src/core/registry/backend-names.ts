export const BACKEND_NAMES = {
  noop: "regionkit.noop",
  mongo: "regionkit.mongo",
  memcachePool: "regionkit.memcache_pool",
  dict: "regionkit.dict",
  redis: "regionkit.redis",
  redisSentinel: "regionkit.redis_sentinel",
} as const

export type BuiltinBackendName = (typeof BACKEND_NAMES)[keyof typeof BACKEND_NAMES]
