import type { Logger } from "@wirebuf/logger"
import type { StorageDump, TraceSink } from "../ports/trace-sink"

/**
 * Routes storage dumps to a Logger at trace level, scoped to
 * `module: "byte-buffer"`. Gating follows the logger's configured level.
 */
export class LoggerTraceSink implements TraceSink {
  private readonly logger: Logger

  constructor(logger: Logger) {
    this.logger = logger.child({ module: "byte-buffer" })
  }

  isTraceEnabled(): boolean {
    return this.logger.isLevelEnabled("trace")
  }

  trace(message: string, meta: StorageDump): void {
    this.logger.trace(message, { size: meta.size, dump: meta.dump })
  }
}

export function createLoggerTraceSink(logger: Logger): TraceSink {
  return new LoggerTraceSink(logger)
}
