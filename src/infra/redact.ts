const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /secret[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

export const SECRET_KEYS = ['password', 'secret', 'token', 'ansible_password'];

/**
 * Masks `password=…`, `secret: …` and `token=…` values inside free text
 */
export function redactText(text: string): string {
  let redacted = text;
  SECRET_PATTERNS.forEach((pattern) => {
    redacted = redacted.replace(pattern, (match: string, secret: string) => {
      return match.replace(secret, '***REDACTED***');
    });
  });
  return redacted;
}

/**
 * Redacts sensitive information from log messages
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return redactText(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj && typeof obj === 'object' && !(obj instanceof Date) && !(obj instanceof Error)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SECRET_KEYS.includes(key)) {
        redacted[key] = '***REDACTED***';
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}
