import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Cookie and Authorization headers
 * - Password material (plaintext and digests)
 * - Session tokens and signing secrets
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  'password',
  'passwordHash',
  'token',
  'secret',
  'appSecret',
  'cookieSecret',
  '*.password',
  '*.passwordHash',
  '*.token',
];

// Matches a compact JWS (three base64url segments)
const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

/**
 * Replace session tokens embedded in free-form strings
 */
export function redactTokens(value: string): string {
  return value.replace(JWT_PATTERN, '[REDACTED_TOKEN]');
}

/**
 * Recursively redact tokens in plain objects and arrays
 * Errors, dates and buffers pass through untouched; repeated references
 * on the current path become '[Circular]'.
 */
export function redactObjectTokens(value: unknown, ancestors: WeakSet<object> = new WeakSet()): unknown {
  if (typeof value === 'string') {
    return redactTokens(value);
  }
  if (
    !value ||
    typeof value !== 'object' ||
    value instanceof Error ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  if (ancestors.has(value)) {
    return '[Circular]';
  }

  ancestors.add(value);
  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map((entry) => redactObjectTokens(entry, ancestors));
  } else {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = redactObjectTokens(entry, ancestors);
    }
    result = copy;
  }
  ancestors.delete(value);
  return result;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const ancestors = new WeakSet<object>([record]);
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = redactObjectTokens(entry, ancestors);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of credentials and session tokens
 * - Request ID correlation via child bindings
 */
export function createLogger(options: pino.LoggerOptions = {}, destination?: pino.DestinationStream) {
  const settings: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: redactRecord,
    },
    ...options,
  };

  return destination ? pino(settings, destination) : pino(settings);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
