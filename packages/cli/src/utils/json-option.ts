import { z } from "zod";
import { ValidationError, formatSchemaError, toErrorMessage } from "@vmforge/core";

export const JsonObjectSchema = z.record(z.unknown());

/**
 * Parses a JSON-valued command line option and checks it against a schema.
 * Throws ValidationError naming the option.
 */
export function parseJsonOption<T>(
  optionName: string,
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`--${optionName} is not valid JSON: ${toErrorMessage(error)}`);
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid --${optionName}: ${formatSchemaError(parsed.error)}`);
  }
  return parsed.data;
}

export function parseOptionalJsonOption<T>(
  optionName: string,
  raw: string | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  return raw === undefined ? undefined : parseJsonOption(optionName, raw, schema);
}
