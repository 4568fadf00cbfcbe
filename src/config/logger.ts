import winston, { Logger } from 'winston';
import { env } from './env';

const logLevel = env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'debug');

// Matched case-insensitively anywhere in a metadata key
const SENSITIVE_FIELDS = ['apikey', 'api_key', 'authtoken', 'token', 'secret', 'password', 'authorization'];

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 5;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey.includes(field));
}

/**
 * Copy of `value` with credential-like fields replaced. Only plain objects
 * and arrays are walked; dates and errors pass through untouched.
 */
export function redactSensitive(value: unknown, depth: number = 0): unknown {
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, depth + 1));
  }
  if (!isPlainObject(value)) {
    return value;
  }
  const redacted: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactSensitive(field, depth + 1);
  }
  return redacted;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactSensitive(info[key]);
  }
  return info;
});

const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  redactFormat(),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: logLevel,
  format: logFormat,
  defaultMeta: { service: env.SERVICE_NAME },
  transports: [
    new winston.transports.Console({
      format: env.NODE_ENV === 'production'
        ? logFormat
        : winston.format.combine(
            redactFormat(),
            winston.format.colorize(),
            winston.format.simple()
          ),
    }),
  ],
});

/** Child logger tagged with the component that writes through it */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
