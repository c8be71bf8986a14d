import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" drops trace and debug entries.
   */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Keep off in production, where
   * JSON lines are expected.
   */
  prettify?: boolean
}
