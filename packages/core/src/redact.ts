export const REDACTED_VALUE = "***";

const SENSITIVE_KEY_PATTERNS = ["password", "token", "secret", "key"];

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Returns a copy of a parameter map that is safe to log. Values under
 * sensitive keys are replaced; nested maps and arrays are walked.
 */
export function redactParams(params: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED_VALUE : redactValue(value);
  }
  return redacted;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (isPlainRecord(value)) {
    return redactParams(value);
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Date);
}
