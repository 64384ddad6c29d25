import { inspect } from "node:util"

export type ToStr = (value: unknown) => string

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Default argument stringifier for generated keys.
 *
 * Strings pass through, plain objects render as JSON, everything else goes
 * through `String()`. A value whose own conversion throws falls back to a
 * key-sorted `util.inspect` rendering so key generation itself never fails.
 */
export function keyGenerateToStr(value: unknown): string {
  if (typeof value === "string") return value

  try {
    return isPlainObject(value) ? JSON.stringify(value) : String(value)
  } catch {
    return inspect(value, {
      depth: null,
      sorted: true,
      breakLength: Number.POSITIVE_INFINITY,
    })
  }
}
