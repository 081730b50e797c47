import { z } from "zod";
import { DEFAULT_LOG_LEVEL, DEFAULT_LOGGER_NAME } from "./constants/defaults";

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

export const RuntimeConfigSchema = z.object({
  logLevel: LogLevel.default(DEFAULT_LOG_LEVEL),
  loggerName: z.string().min(1).default(DEFAULT_LOGGER_NAME),
  seedDefaultTemplates: z.boolean().default(true),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

const RuntimeEnvSchema = z.object({
  VMFORGE_LOG_LEVEL: LogLevel.optional(),
  VMFORGE_LOG_NAME: z.string().min(1).optional(),
  VMFORGE_SEED_TEMPLATES: booleanFlag.optional(),
});

/**
 * Reads runtime configuration from environment variables. Throws a ZodError
 * naming the offending variable when a value is malformed.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.parse({
    VMFORGE_LOG_LEVEL: env.VMFORGE_LOG_LEVEL?.toLowerCase(),
    VMFORGE_LOG_NAME: env.VMFORGE_LOG_NAME,
    VMFORGE_SEED_TEMPLATES: env.VMFORGE_SEED_TEMPLATES?.toLowerCase(),
  });

  return RuntimeConfigSchema.parse({
    logLevel: parsed.VMFORGE_LOG_LEVEL,
    loggerName: parsed.VMFORGE_LOG_NAME,
    seedDefaultTemplates: parsed.VMFORGE_SEED_TEMPLATES,
  });
}
