const SENSITIVE_KEY_PARTS = ["password", "pass", "token", "secret", "key"];

const MAX_LOGGED_QUERY_LENGTH = 500;

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

export function redactVariables(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactVariables(item));
  }

  if (typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = isSensitiveKey(key) ? "[REDACTED]" : redactVariables(entry);
    }
    return result;
  }

  return value;
}

/** Hides variable declarations and truncates long documents before logging. */
export function sanitizeQuery(query: string): string {
  const sanitized = query.replace(/\$\w+\s*:\s*[\w!\[\]]+/g, "$$VARIABLE");
  if (sanitized.length > MAX_LOGGED_QUERY_LENGTH) {
    return `${sanitized.slice(0, MAX_LOGGED_QUERY_LENGTH)}...`;
  }
  return sanitized;
}
