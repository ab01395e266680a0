/**
 * @fileoverview Redaction helpers for values that are written to logs.
 * @module src/utils/security/sanitization
 */

const SENSITIVE_FIELDS = [
  "password",
  "token",
  "secret",
  "key",
  "apikey",
  "api_key",
  "auth",
  "credential",
  "jwt",
  "bearer",
];

const MAX_LOGGED_STRING_LENGTH = 1000;

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lower.includes(field));
}

function redact(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return value.length > MAX_LOGGED_STRING_LENGTH
      ? `${value.substring(0, MAX_LOGGED_STRING_LENGTH)}...[truncated]`
      : value;
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? "[REDACTED]" : redact(entry, seen);
  }
  return result;
}

/**
 * Returns a deep copy of `input` suitable for logging: values under keys that
 * look like credentials are replaced with `[REDACTED]` and long strings are
 * truncated. The input is not modified.
 */
export function sanitizeInputForLogging(input: unknown): unknown {
  return redact(input, new WeakSet());
}
