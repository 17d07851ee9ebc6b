import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Sensitive field names that must be redacted from logs.
 * Exported for testing to prevent regression.
 */
export const REDACTED_FIELD_PATHS = [
  "password",
  "token",
  "secret",
  "*.password",
  "*.token",
  "*.secret",
] as const;

export interface LoggerSettings {
  nodeEnv?: string;
  logFormat?: string;
  logLevel?: string;
  name?: string;
}

/**
 * Creates pino configuration based on environment settings.
 * JSON goes to stdout in production or when LOG_FORMAT=json; everything else
 * is pretty-printed.
 * Exported for testing.
 */
export function createLoggerOptions({
  nodeEnv,
  logFormat,
  logLevel,
  name,
}: LoggerSettings): LoggerOptions {
  const isProduction = nodeEnv === "production";
  const useJson = logFormat === "json" || isProduction;

  return {
    name: name ?? "colframe",
    level: logLevel ?? (isProduction ? "info" : "debug"),
    transport: useJson
      ? undefined
      : {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard" },
        },
    redact: {
      paths: [...REDACTED_FIELD_PATHS],
      censor: "[REDACTED]",
    },
  };
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  return pino(createLoggerOptions(settings));
}

/**
 * Logger used when the caller supplies none. Emits nothing.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export type { Logger };
