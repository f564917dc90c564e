import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Whether an entry at `level` would be emitted.
   *
   * Callers that build expensive payloads (hex dumps, decoded field lists)
   * check this first so nothing is formatted when the level is off.
   */
  isLevelEnabled(level: LogLevelName): boolean

  /**
   * Creates a child logger that inherits the parent context and adds
   * additional contextual fields.
   *
   * Intended for scoping logs to a connection or a single message
   * (e.g. connectionId, opcode, direction).
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
