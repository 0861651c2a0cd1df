import type { LogLevel } from "@scopebound/types";

export type LogFormat = "json" | "human" | "auto";

export type AppConfig = {
  environment: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  logRedactKeys: string[];
  port: number;
  host: string;
};

const VALID_LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const VALID_LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = "0.0.0.0";

function pick<T extends string>(allowed: readonly T[], raw: string | undefined, fallback: T): T {
  return allowed.find((value) => value === raw) ?? fallback;
}

function parsePort(raw: string | undefined): number {
  if (!raw) return DEFAULT_PORT;
  const port = Number(raw);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : DEFAULT_PORT;
}

export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    environment: env.SCOPEBOUND_ENV ?? "local",
    logLevel: pick(VALID_LOG_LEVELS, env.SCOPEBOUND_LOG_LEVEL, "info"),
    logFormat: pick(VALID_LOG_FORMATS, env.SCOPEBOUND_LOG_FORMAT, "auto"),
    logFilePath: env.SCOPEBOUND_LOG_FILE_PATH ?? null,
    logRedactKeys: (env.SCOPEBOUND_LOG_REDACT_KEYS ?? "")
      .split(",")
      .map((key) => key.trim())
      .filter((key) => key.length > 0),
    port: parsePort(env.SCOPEBOUND_PORT),
    host: env.SCOPEBOUND_HOST ?? DEFAULT_HOST,
  };
}
