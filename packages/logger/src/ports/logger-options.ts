import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how logs are rendered for humans vs machines
 *
 * Concrete adapters must honor these options, but are free to choose how
 * they are implemented internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs, which also
   * turns off buffer dumps.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for local debugging.
   * Production should keep structured (JSON) output.
   */
  prettify?: boolean
}
