import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Where JSON lines go. Ignored when `prettify` is set (pino-pretty owns the output). */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.opts = opts
    this.logger = this.init(deps, bindings, base)
  }

  private init(
    deps: PinoLoggerDeps,
    bindings: LogContextPatch,
    base?: PinoLoggerBase,
  ): PinoLoggerBase {
    if (base) return base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    }

    const root =
      deps.destination && !this.opts.prettify
        ? pino(pinoOpts, deps.destination)
        : pino(pinoOpts)

    return root.child(bindings)
  }

  private toPinoMeta(meta?: LogMeta<TContext>): object {
    return meta ?? {}
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(this.toPinoMeta(meta), message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(this.toPinoMeta(meta), message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(this.toPinoMeta(meta), message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(this.toPinoMeta(meta), message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(this.toPinoMeta(meta), message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(this.toPinoMeta(meta), message)
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return this.logger.isLevelEnabled(level)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({}, this.opts, context, this.logger)
  }
}
