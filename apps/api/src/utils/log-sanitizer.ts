/**
 * Log Sanitization Utility
 * Removes credentials and secrets from log metadata before it is written
 */

const SENSITIVE_PATTERNS = [
  /password/i,
  /token/i,
  /secret/i,
  /credential/i,
  /authorization/i,
  /cookie/i,
];

/**
 * Recursively sanitize an object by redacting sensitive fields
 */
export function sanitizeLogData(data: unknown, depth = 0, maxDepth = 10): unknown {
  if (depth > maxDepth) {
    return '[Max Depth Reached]';
  }

  if (data === null || data === undefined || typeof data !== 'object') {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLogData(item, depth + 1, maxDepth));
  }

  if (data instanceof Error) {
    return sanitizeError(data);
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeLogData(value, depth + 1, maxDepth);
    }
  }

  return sanitized;
}

/**
 * Redact the top-level fields of a log context, recursing into values
 */
export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    sanitized[key] = SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))
      ? '[REDACTED]'
      : sanitizeLogData(value, 1);
  }
  return sanitized;
}

/**
 * Sanitize error object for logging.
 * SQLSTATE is kept; bound parameters that pg attaches are not.
 */
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return {
      name: error.name,
      message: error.message,
      ...(typeof code === 'string' ? { code } : {}),
      stack: error.stack,
    };
  }
  return { value: sanitizeLogData(error) };
}
