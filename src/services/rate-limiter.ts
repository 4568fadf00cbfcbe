import { logger } from '../config/logger';
import {
  FREQUENCY_LIMIT_WINDOW_SECONDS,
  RATE_LIMITS,
  RateLimitConfig,
  RateLimitRule,
} from '../config/rate-limits';
import {
  Clock,
  Notification,
  NotificationChannel,
  NotificationType,
  systemClock,
} from '../types/notification.types';

export interface RateLimitResult {
  allowed: boolean;
  key: string;
  remaining: number;
  resetAt: Date;
  retryAfter?: number; // Seconds until retry
}

/**
 * Sliding-window counters keyed by string.
 *
 * Every check runs synchronously, so a check and the hit it records cannot
 * interleave with another caller on the event loop.
 */
export class RateLimiter {
  private readonly windows = new Map<string, number[]>();

  constructor(
    private readonly config: RateLimitConfig = RATE_LIMITS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * User and type limits are checked together: a hit is recorded on both
   * only when both allow it.
   */
  checkLimits(notification: Notification, now: Date = this.clock()): RateLimitResult {
    const userKey = `user:${notification.userId}`;
    const typeKey = `type:${notification.type}`;
    const typeRule = this.config.types[notification.type];

    const userResult = this.evaluate(userKey, this.config.user, now);
    if (!userResult.allowed) {
      this.logExceeded(userResult);
      return userResult;
    }
    const typeResult = this.evaluate(typeKey, typeRule, now);
    if (!typeResult.allowed) {
      this.logExceeded(typeResult);
      return typeResult;
    }

    this.hit(userKey, this.config.user, now);
    this.hit(typeKey, typeRule, now);
    return { ...userResult, remaining: Math.min(userResult.remaining, typeResult.remaining) - 1 };
  }

  checkChannel(channel: NotificationChannel, now: Date = this.clock()): RateLimitResult {
    return this.check(`channel:${channel}`, this.config.channels[channel], now);
  }

  /** Per-user, per-type cap from the user's preference */
  checkFrequency(
    userId: string,
    type: NotificationType,
    limit: number,
    now: Date = this.clock()
  ): RateLimitResult {
    return this.check(
      `pref:${userId}:${type}`,
      { max: limit, duration: FREQUENCY_LIMIT_WINDOW_SECONDS },
      now
    );
  }

  check(key: string, rule: RateLimitRule | undefined, now: Date = this.clock()): RateLimitResult {
    const result = this.evaluate(key, rule, now);
    if (!result.allowed) {
      this.logExceeded(result);
      return result;
    }
    this.hit(key, rule, now);
    return { ...result, remaining: result.remaining - 1 };
  }

  /** Hits currently inside the key's window */
  getUsage(key: string, windowSeconds: number, now: Date = this.clock()): number {
    return this.prune(key, windowSeconds, now.getTime()).length;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(key);
    }
  }

  private evaluate(key: string, rule: RateLimitRule | undefined, now: Date): RateLimitResult {
    const nowMs = now.getTime();
    if (!rule) {
      return {
        allowed: true,
        key,
        remaining: Infinity,
        resetAt: new Date(nowMs + 3600000),
      };
    }

    const hits = this.prune(key, rule.duration, nowMs);
    const windowMs = rule.duration * 1000;

    if (hits.length >= rule.max) {
      const oldest = hits[0] ?? nowMs;
      return {
        allowed: false,
        key,
        remaining: 0,
        resetAt: new Date(oldest + windowMs),
        retryAfter: Math.max(1, Math.ceil((oldest + windowMs - nowMs) / 1000)),
      };
    }

    return {
      allowed: true,
      key,
      remaining: rule.max - hits.length,
      resetAt: new Date(nowMs + windowMs),
    };
  }

  private hit(key: string, rule: RateLimitRule | undefined, now: Date): void {
    if (!rule) {
      return;
    }
    const hits = this.windows.get(key) ?? [];
    hits.push(now.getTime());
    this.windows.set(key, hits);
  }

  private prune(key: string, windowSeconds: number, nowMs: number): number[] {
    const hits = this.windows.get(key);
    if (!hits) {
      return [];
    }
    const windowStart = nowMs - windowSeconds * 1000;
    const live = hits.filter((t) => t > windowStart);
    if (live.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, live);
    }
    return live;
  }

  private logExceeded(result: RateLimitResult): void {
    logger.warn('Rate limit exceeded', {
      key: result.key,
      retryAfter: result.retryAfter,
    });
  }
}
