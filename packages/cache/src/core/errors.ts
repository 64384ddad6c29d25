import { BaseError, type BaseErrorOptions } from "@regionkit/errors"

export type ConfigurationErrorCode = "cache.configuration" | "cache.unknown_backend"

type ConfigurationErrorOptions = Omit<BaseErrorOptions<ConfigurationErrorCode>, "code"> & {
  code?: ConfigurationErrorCode
}

/**
 * Raised for anything wrong with how a region or backend was set up: bad
 * arguments, unknown backend names, use before configuration.
 */
export class ConfigurationError extends BaseError<ConfigurationErrorCode> {
  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? "cache.configuration" })
  }
}

export class UnknownBackendError extends ConfigurationError {
  constructor(readonly backend: string) {
    super(`No cache backend registered under "${backend}"`, {
      code: "cache.unknown_backend",
      context: { backend },
    })
  }
}
