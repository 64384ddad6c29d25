import type { CacheKey } from "../../ports/cache-key"
import { ConfigurationError } from "../errors"
import { keyGenerateToStr, type ToStr } from "./to-str"

/**
 * Identity of a memoized function. `module` plays the part of a qualifying
 * path so two functions with the same name in different places do not share
 * keys.
 */
export type KeyTarget = {
  readonly name: string
  readonly module?: string | undefined
}

export type KeyGenerator<A extends readonly unknown[]> = (...args: A) => CacheKey

export type FunctionKeyGenerator = <A extends readonly unknown[]>(
  namespace: string | undefined,
  target: KeyTarget,
  toStr?: ToStr,
) => KeyGenerator<A>

function keyPrefix(namespace: string | undefined, target: KeyTarget): string {
  if (target.name === "") {
    throw new ConfigurationError(
      "Cannot derive cache keys for an anonymous function; pass an explicit name",
    )
  }

  const qualified = target.module ? `${target.module}:${target.name}` : target.name

  return namespace ? `${qualified}|${namespace}` : qualified
}

/**
 * Builds keys of the form `<module:name>[|<namespace>]|<arg1> <arg2> ...`.
 *
 * Argument order is significant and every argument is stringified with
 * `toStr`.
 *
 * @example
 * ```ts
 * const keyFor = functionKeyGenerator("v2", { name: "getUser", module: "users" })
 * keyFor(42, "eu") // "users:getUser|v2|42 eu"
 * ```
 */
export const functionKeyGenerator: FunctionKeyGenerator = (
  namespace,
  target,
  toStr = keyGenerateToStr,
) => {
  const prefix = keyPrefix(namespace, target)

  return (...args) => `${prefix}|${args.map((arg) => toStr(arg)).join(" ")}`
}

/**
 * One-shot form of {@link functionKeyGenerator}.
 */
export function generateKey(
  namespace: string | undefined,
  target: KeyTarget,
  args: readonly unknown[],
  toStr: ToStr = keyGenerateToStr,
): CacheKey {
  return functionKeyGenerator(namespace, target, toStr)(...args)
}
