/**
 * Shared logger module for vmforge packages
 */
import pino from "pino";
import type { Logger } from "pino";
import { loadRuntimeConfig } from "./config";
import type { LogLevel } from "./config";
import { redactParams } from "./redact";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  level?: LogLevel;
}

export function createLogger(component: string, options: CreateLoggerOptions = {}): Logger {
  const config = loadRuntimeConfig();
  return pino({
    name: `${config.loggerName}:${component}`,
    level: options.level ?? config.logLevel,
  });
}

/**
 * Logs a user-supplied parameter map at info level. The map is always
 * redacted first; never pass raw parameters to the logger directly.
 */
export function logParams(
  logger: Logger,
  message: string,
  params: Readonly<Record<string, unknown>>
): void {
  logger.info({ params: redactParams(params) }, message);
}
