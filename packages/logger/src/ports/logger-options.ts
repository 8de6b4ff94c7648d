import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses the "trace" and "debug" entries the
   * configuration engine writes while resolving files.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for local debugging of include and defaults resolution. Leave it
   * off where logs are ingested as JSON.
   */
  prettify?: boolean
}
