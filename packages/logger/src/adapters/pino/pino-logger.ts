import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Where JSON lines go. Defaults to stdout; ignored when `prettify` is set. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.logger = base ? base.child(bindings) : createBase(deps, opts).child(bindings)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({}, {}, context, this.logger)
  }
}

function createBase(deps: PinoLoggerDeps, opts: Partial<LoggerOptions>): PinoLoggerBase {
  const pinoOpts: PinoOptions = {
    ...(opts.level && { level: opts.level }),
    serializers: { err: errWithCause },
  }

  if (opts.prettify) {
    return pino({
      ...pinoOpts,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "hostname",
        },
      },
    })
  }

  return deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)
}

export function createPinoLogger(
  opts: Partial<LoggerOptions> = {},
  bindings: LogContextPatch = {},
): Logger {
  return new PinoLogger({}, opts, bindings)
}
