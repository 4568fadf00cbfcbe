import { env } from './env';
import { NotificationChannel, NotificationType } from '../types/notification.types';

export interface RateLimitRule {
  max: number;
  duration: number; // window in seconds
}

export interface RateLimitConfig {
  user: RateLimitRule;
  types: Partial<Record<NotificationType, RateLimitRule>>;
  channels: Partial<Record<NotificationChannel, RateLimitRule>>;
}

// Keys without a rule are unlimited
export const RATE_LIMITS: RateLimitConfig = {
  user: {
    max: env.RATE_LIMIT_USER_PER_HOUR,
    duration: 3600 // 1 hour
  },

  types: {
    trading_alert: {
      max: env.RATE_LIMIT_TRADING_ALERT_PER_HOUR,
      duration: 3600
    }
  },

  channels: {
    email: {
      max: env.RATE_LIMIT_EMAIL_PER_MIN,
      duration: 60 // 1 minute
    },
    sms: {
      max: env.RATE_LIMIT_SMS_PER_MIN,
      duration: 60
    }
  }
};

export const FREQUENCY_LIMIT_WINDOW_SECONDS = 3600;
