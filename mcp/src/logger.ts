/**
 * Structured logging on top of pino.
 *
 * Everything is written to stderr: stdout belongs to the MCP stdio transport,
 * and a stray line there corrupts the protocol stream.
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export type LogContext = Record<string, unknown>;

function createPinoLogger(options: LoggerOptions): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? "info",
    name: options.name ?? "git-tools-mcp",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

export class Logger {
  private readonly pino: pino.Logger;

  constructor(options: LoggerOptions = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
  }

  child(context: LogContext): Logger {
    return new Logger({}, this.pino.child(context));
  }

  debug(msg: string, data?: LogContext): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: LogContext): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: LogContext): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: unknown, data?: LogContext): void {
    this.pino.error({ ...data, err: error }, msg);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
