const SENSITIVE_KEYS = /^(authorization|password|secret|token|api[_-]?key|x-api-key|credential|access[_-]?token)$/i;
const SENSITIVE_VALUES = /Bearer\s|sk-ant-|sk-proj-|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY/;

/** Mask credentials in free-form notes before they reach disk. */
export function redactNote(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return SENSITIVE_VALUES.test(value) ? "[REDACTED]" : value;
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redactNote);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = SENSITIVE_KEYS.test(k) && typeof v === "string" ? "[REDACTED]" : redactNote(v);
  }
  return result;
}
