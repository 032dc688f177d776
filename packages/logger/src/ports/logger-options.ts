import type { LogLevelName } from "./log-level"

/**
 * Policy options every Logger adapter must honor.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are ingested
   * as JSON.
   */
  prettify?: boolean
}
