import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Render human-readable lines through pino-pretty instead of JSON.
   * Meant for local development only.
   */
  prettify?: boolean
}
