import { z } from "zod"
import type { BackendArguments } from "../../ports/cache-backend"
import { ConfigurationError } from "../errors"

/** Numbers arrive as strings from `backendArgument`; accept both. */
export const numberArgument = z.coerce.number()

/** `true`/`false` or any of zod's string booleans ("yes", "1", "off", ...). */
export const booleanArgument = z.union([z.boolean(), z.stringbool()])

/** A comma-separated string or an explicit list. */
export const listArgument = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (typeof value === "string" ? value.split(",") : value)
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )

export function parseBackendArguments<T>(
  backend: string,
  schema: z.ZodType<T>,
  args: BackendArguments,
): T {
  const result = schema.safeParse(args)

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid arguments for cache backend "${backend}":\n${z.prettifyError(result.error)}`,
      { context: { backend }, cause: result.error },
    )
  }

  return result.data
}
