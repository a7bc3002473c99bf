import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface LoggerSettings {
  level: string;
  env: string;
}

export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  const options: LoggerOptions = {
    level: settings.level,
    base: { service: "claimbot" }
  };

  if (settings.env === "development") {
    options.transport = { target: "pino-pretty" };
  }

  return options;
}

export function createLogger(settings: LoggerSettings): Logger {
  return pino(buildLoggerOptions(settings));
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  env: process.env.NODE_ENV ?? "production"
});

export const silentLogger: Logger = pino({ level: "silent" });
