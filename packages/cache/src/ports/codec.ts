/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Backends that talk to an out-of-process store (memcached, MongoDB, Redis)
 * hold a `Codec<CachedValue>` and never see the caller's types. In-process
 * backends keep values as-is and need no codec.
 *
 * Implementations must satisfy `decode(encode(value))` being structurally
 * equal to `value` for every value they accept.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
