import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; anything below it is dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output instead of one JSON object per line.
   * Meant for a terminal, not for log files.
   */
  prettify?: boolean
}
