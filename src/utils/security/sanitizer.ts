/**
 * Security Sanitizer
 *
 * Removes credentials (URL user info, tokens in query strings, auth headers)
 * from data before it is logged. Ingested links routinely carry signed query
 * parameters, so every log line goes through here.
 */

const SENSITIVE_PATTERNS = {
  // OAuth Bearer tokens
  bearerToken: /bearer\s+[A-Za-z0-9._~+/-]{20,}=*/gi,

  // API keys (various formats)
  apiKey: /(api[_-]?key|apikey)[=:]\s*([A-Za-z0-9_-]{16,})/gi,

  // Authorization headers
  authHeader: /(authorization|auth)[=:]\s*(bearer|basic)\s+[^\s,;]+/gi,

  // URLs with credentials
  urlWithCreds: /https?:\/\/[^\s/:@]+:[^\s/@]+@[^\s]+/gi,

  // Secret-looking query parameters inside URLs
  queryToken: /([?&](?:token|access_token|key|secret|password|auth|sig|signature)=)[^&#\s]+/gi,
};

// Field names that should always be sanitized
const SENSITIVE_FIELD_NAMES = [
  'token',
  'password',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
  'credential',
];

/**
 * Sanitize a string by replacing sensitive patterns
 */
export function sanitizeString(str: string): string {
  if (!str) {
    return str;
  }

  let sanitized = str;

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.bearerToken, 'Bearer [REDACTED_TOKEN]');
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.apiKey, '$1=[REDACTED_API_KEY]');
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.authHeader, '$1=[REDACTED_AUTH_HEADER]');

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.urlWithCreds, (match) => {
    try {
      const url = new URL(match);
      return `${url.protocol}//[REDACTED_CREDENTIALS]@${url.host}${url.pathname}${url.search}${url.hash}`;
    } catch {
      return '[REDACTED_URL_WITH_CREDS]';
    }
  });

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.queryToken, '$1[REDACTED]');

  return sanitized;
}

/**
 * Sanitize an error object
 */
export function sanitizeError(error: unknown): Error {
  if (!(error instanceof Error)) {
    return new Error(sanitizeString(String(error)));
  }

  const sanitizedError = new Error(sanitizeString(error.message));
  sanitizedError.name = error.name;

  if (error.stack) {
    sanitizedError.stack = sanitizeString(error.stack);
  }

  return sanitizedError;
}

function isSensitiveField(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELD_NAMES.some((name) => lowerKey.includes(name));
}

/**
 * Sanitize an object recursively
 */
export function sanitizeObject(value: unknown, depth = 0, maxDepth = 10): unknown {
  if (depth > maxDepth) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return sanitizeString(value);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeObject(item, depth + 1, maxDepth));
  }

  if (value instanceof Date) {
    return value;
  }

  if (value instanceof Error) {
    const sanitized = sanitizeError(value);
    return { name: sanitized.name, message: sanitized.message };
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, entry] of Object.entries(value)) {
    if (isSensitiveField(key) && entry !== null && entry !== undefined) {
      sanitized[key] = `[REDACTED_${key.toUpperCase()}]`;
    } else {
      sanitized[key] = sanitizeObject(entry, depth + 1, maxDepth);
    }
  }

  return sanitized;
}

/**
 * Sanitize data for logging
 * This is the main function to use before logging any data
 */
export function sanitizeForLogging(data: unknown): unknown {
  if (typeof data === 'string') {
    return sanitizeString(data);
  }

  return sanitizeObject(data);
}
