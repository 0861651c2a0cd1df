import pino from "pino";
import type { Logger, LogLevel } from "@scopebound/types";
import type { AppConfig } from "../config/env";

export type LoggingConfig = Pick<
  AppConfig,
  "environment" | "logLevel" | "logFormat" | "logFilePath" | "logRedactKeys"
>;

/**
 * Thin pino wrapper implementing Logger.
 * Every method delegates directly to the underlying pino instance.
 */
export class PinoLogger implements Logger {
  constructor(private pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child(attributes));
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

/**
 * Builds the application logger. `destination` replaces every configured
 * stream, which is how tests capture output.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): PinoLogger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    redact:
      config.logRedactKeys.length > 0
        ? { paths: config.logRedactKeys, censor: "[REDACTED]" }
        : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destination) {
    return new PinoLogger(pino(options, destination));
  }

  const streams: pino.StreamEntry[] = [];
  const useHumanFormat =
    config.logFormat === "human" || (config.logFormat === "auto" && config.environment === "local");

  if (useHumanFormat) {
    // pino-pretty runs in a worker thread — local development only
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: 1 } }),
    });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(1) });
  }

  if (config.logFilePath) {
    streams.push({ level: config.logLevel, stream: pino.destination(config.logFilePath) });
  }

  return new PinoLogger(pino(options, pino.multistream(streams)));
}
