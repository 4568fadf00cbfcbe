import { config } from 'dotenv';

// Load environment variables
config();

export interface EnvConfig {
  // Service
  NODE_ENV: 'development' | 'test' | 'staging' | 'production';
  SERVICE_NAME: string;
  /** Log level: error, warn, info, http, verbose, debug, silly */
  LOG_LEVEL?: string;

  // Delivery engine
  WORKER_COUNT: number;
  QUEUE_CAPACITY: number;
  RETRY_QUEUE_CAPACITY: number;
  /** How long a worker waits on an empty queue before re-checking for shutdown */
  QUEUE_POLL_INTERVAL_MS: number;
  CHANNEL_TIMEOUT_MS: number;

  // Scheduler
  SCHEDULER_TICK_MS: number;
  SCHEDULE_RETENTION_DAYS: number;

  // Preferences
  PREFERENCE_CACHE_TTL: number;

  // Bulk send
  BULK_BATCH_SIZE: number;
  BULK_BATCH_PAUSE_MS: number;

  // Rate Limiting
  RATE_LIMIT_USER_PER_HOUR: number;
  RATE_LIMIT_TRADING_ALERT_PER_HOUR: number;
  RATE_LIMIT_EMAIL_PER_MIN: number;
  RATE_LIMIT_SMS_PER_MIN: number;

  // SendGrid
  SENDGRID_API_KEY?: string;
  SENDGRID_FROM_EMAIL: string;
  SENDGRID_FROM_NAME: string;

  // Twilio
  TWILIO_ACCOUNT_SID?: string;
  TWILIO_AUTH_TOKEN?: string;
  TWILIO_FROM_NUMBER?: string;
  TWILIO_MESSAGING_SERVICE_SID?: string;

  // Push gateway
  PUSH_GATEWAY_URL?: string;
  PUSH_API_KEY?: string;

  // Webhooks
  WEBHOOK_SECRET?: string;

  // Feature Flags
  ENABLE_SMS: boolean;
  ENABLE_EMAIL: boolean;
  ENABLE_PUSH: boolean;
  ENABLE_WEBHOOK_DELIVERY: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (!value && defaultValue !== undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value || '', 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} is not a valid number`);
  }
  return parsed;
}

function getEnvVarAsBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getNodeEnv(): EnvConfig['NODE_ENV'] {
  switch (process.env.NODE_ENV) {
    case 'test':
    case 'staging':
    case 'production':
      return process.env.NODE_ENV;
    default:
      return 'development';
  }
}

export const env: EnvConfig = {
  // Service
  NODE_ENV: getNodeEnv(),
  SERVICE_NAME: getEnvVar('SERVICE_NAME', 'notification-engine'),
  LOG_LEVEL: process.env.LOG_LEVEL,

  // Delivery engine
  WORKER_COUNT: getEnvVarAsNumber('WORKER_COUNT', 5),
  QUEUE_CAPACITY: getEnvVarAsNumber('QUEUE_CAPACITY', 1000),
  RETRY_QUEUE_CAPACITY: getEnvVarAsNumber('RETRY_QUEUE_CAPACITY', 1000),
  QUEUE_POLL_INTERVAL_MS: getEnvVarAsNumber('QUEUE_POLL_INTERVAL_MS', 1000),
  CHANNEL_TIMEOUT_MS: getEnvVarAsNumber('CHANNEL_TIMEOUT_MS', 30000),

  // Scheduler
  SCHEDULER_TICK_MS: getEnvVarAsNumber('SCHEDULER_TICK_MS', 1000),
  SCHEDULE_RETENTION_DAYS: getEnvVarAsNumber('SCHEDULE_RETENTION_DAYS', 7),

  // Preferences (seconds)
  PREFERENCE_CACHE_TTL: getEnvVarAsNumber('PREFERENCE_CACHE_TTL', 300),

  // Bulk send
  BULK_BATCH_SIZE: getEnvVarAsNumber('BULK_BATCH_SIZE', 50),
  BULK_BATCH_PAUSE_MS: getEnvVarAsNumber('BULK_BATCH_PAUSE_MS', 100),

  // Rate Limiting
  RATE_LIMIT_USER_PER_HOUR: getEnvVarAsNumber('RATE_LIMIT_USER_PER_HOUR', 100),
  RATE_LIMIT_TRADING_ALERT_PER_HOUR: getEnvVarAsNumber('RATE_LIMIT_TRADING_ALERT_PER_HOUR', 50),
  RATE_LIMIT_EMAIL_PER_MIN: getEnvVarAsNumber('RATE_LIMIT_EMAIL_PER_MIN', 10),
  RATE_LIMIT_SMS_PER_MIN: getEnvVarAsNumber('RATE_LIMIT_SMS_PER_MIN', 5),

  // Credentials are optional here; a channel without them fails initialize()
  // SendGrid
  SENDGRID_API_KEY: process.env.SENDGRID_API_KEY,
  SENDGRID_FROM_EMAIL: getEnvVar('SENDGRID_FROM_EMAIL', 'noreply@example.com'),
  SENDGRID_FROM_NAME: getEnvVar('SENDGRID_FROM_NAME', 'Notifications'),

  // Twilio
  TWILIO_ACCOUNT_SID: process.env.TWILIO_ACCOUNT_SID,
  TWILIO_AUTH_TOKEN: process.env.TWILIO_AUTH_TOKEN,
  TWILIO_FROM_NUMBER: process.env.TWILIO_FROM_NUMBER,
  TWILIO_MESSAGING_SERVICE_SID: process.env.TWILIO_MESSAGING_SERVICE_SID,

  // Push gateway
  PUSH_GATEWAY_URL: process.env.PUSH_GATEWAY_URL,
  PUSH_API_KEY: process.env.PUSH_API_KEY,

  // Webhooks
  WEBHOOK_SECRET: process.env.WEBHOOK_SECRET,

  // Feature Flags
  ENABLE_SMS: getEnvVarAsBoolean('ENABLE_SMS', true),
  ENABLE_EMAIL: getEnvVarAsBoolean('ENABLE_EMAIL', true),
  ENABLE_PUSH: getEnvVarAsBoolean('ENABLE_PUSH', false),
  ENABLE_WEBHOOK_DELIVERY: getEnvVarAsBoolean('ENABLE_WEBHOOK_DELIVERY', true),
};
