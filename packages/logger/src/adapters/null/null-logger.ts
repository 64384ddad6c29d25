import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/**
 * Discards every entry. Context added through `child()` is still tracked so
 * code that derives region or backend loggers can be inspected in tests.
 */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(private readonly context: LogContextPatch = {}) {}

  bindings(): LogContextPatch {
    return { ...this.context }
  }

  trace(_message: string, _meta?: LogMeta<TContext>): void {}

  debug(_message: string, _meta?: LogMeta<TContext>): void {}

  info(_message: string, _meta?: LogMeta<TContext>): void {}

  warn(_message: string, _meta?: LogMeta<TContext>): void {}

  error(_message: string, _meta?: LogMeta<TContext>): void {}

  fatal(_message: string, _meta?: LogMeta<TContext>): void {}

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>({ ...this.context, ...context })
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(
  context: LogContextPatch = {},
): Logger<TContext> {
  return new NullLogger<TContext>(context)
}
