/**
 * Redaction of secrets before they reach a log line.
 *
 * Tool output and configuration routinely carry connection strings, so the
 * patterns here lean towards database credentials.
 */

export interface SanitizeOptions {
  placeholder?: string;
  maxStringLength?: number;
  maxDepth?: number;
}

const DEFAULT_OPTIONS: Required<SanitizeOptions> = {
  placeholder: '[REDACTED]',
  maxStringLength: 1000,
  maxDepth: 8
};

const SENSITIVE_PATTERNS: RegExp[] = [
  // ADO.NET style connection string secrets: Password=...; Pwd=...
  /\b(?:password|pwd)\s*=\s*[^;"'\s]+/gi,
  // password="..." / secret: '...'
  /\b(?:password|passwd|secret|token)\s*[:=]\s*["'][^"']*["']/gi,
  // URIs with embedded credentials
  /\b[a-z][a-z0-9+.-]*:\/\/[^\s:@/]+:[^\s@/]+@[^\s]+/gi,
  /\bBearer\s+[A-Za-z0-9._~+/=-]+/g
];

const SENSITIVE_KEYS = /^(?:password|pwd|secret|token|apikey|api_key|authorization|connectionstring)$/i;

/**
 * Redact known secret patterns in a string and truncate it
 */
export function sanitizeString(input: string, options: SanitizeOptions = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let result = input;

  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, opts.placeholder);
  }

  if (result.length > opts.maxStringLength) {
    result = result.substring(0, opts.maxStringLength) + '...[TRUNCATED]';
  }

  return result;
}

/**
 * Recursively sanitize an object, redacting sensitive keys and string values
 */
export function sanitizeObject(value: unknown, options: SanitizeOptions = {}, depth = 0): unknown {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (typeof value === 'string') {
    return sanitizeString(value, opts);
  }
  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }
  if (depth >= opts.maxDepth) {
    return '[MAX_DEPTH]';
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeString(value.message, opts),
      stack: value.stack
    };
  }
  if (Array.isArray(value)) {
    return value.map(item => sanitizeObject(item, opts, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = SENSITIVE_KEYS.test(key) && entry !== undefined
      ? opts.placeholder
      : sanitizeObject(entry, opts, depth + 1);
  }
  return result;
}

export function sanitizeMessage(message: string): string {
  return sanitizeString(message);
}

export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized = sanitizeObject(data);
  return isRecord(sanitized) ? sanitized : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
