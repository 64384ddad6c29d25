import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * UTF-8 superjson. Keeps `Date`, `Map`, `Set`, `BigInt` and `undefined`
 * intact across out-of-process backends.
 */
export function createSuperJsonCodec<T>(): Codec<T> {
  return {
    encode: (value) => encoder.encode(superjson.stringify(value)),
    decode: (bytes) => superjson.parse<T>(decoder.decode(bytes)),
  }
}
