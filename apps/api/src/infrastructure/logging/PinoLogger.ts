import pino from "pino";
import { SERVICE_NAME } from "../../shared/config/service";
import { ILogger, LogContext } from "./ILogger";

export interface PinoLoggerOptions {
  name?: string;
  level?: string;
  pretty?: boolean;
}

/**
 * Pino logger implementation
 */
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(options: PinoLoggerOptions = {}, instance?: pino.Logger) {
    this.logger =
      instance ??
      pino({
        name: options.name ?? SERVICE_NAME,
        level: options.level ?? "info",
        transport: options.pretty
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:standard",
              },
            }
          : undefined,
      });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  child(bindings: LogContext): ILogger {
    return new PinoLogger({}, this.logger.child(bindings));
  }
}
