import { describe, it, expect, beforeEach } from '@jest/globals';
import { RateLimitConfig } from '../../../src/config/rate-limits';
import { RateLimiter } from '../../../src/services/rate-limiter';
import { ManualClock, buildNotification } from '../../helpers/fixtures';

const config: RateLimitConfig = {
  user: { max: 2, duration: 60 },
  types: { trading_alert: { max: 1, duration: 60 } },
  channels: { email: { max: 1, duration: 60 } },
};

describe('RateLimiter', () => {
  let clock: ManualClock;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = new ManualClock();
    limiter = new RateLimiter(config, clock.now);
  });

  describe('checkLimits', () => {
    it('should allow up to the user limit and then refuse', () => {
      const notification = buildNotification();

      expect(limiter.checkLimits(notification).remaining).toBe(1);
      expect(limiter.checkLimits(notification).remaining).toBe(0);

      const refused = limiter.checkLimits(notification);
      expect(refused.allowed).toBe(false);
      expect(refused.key).toBe('user:user-1');
      expect(refused.retryAfter).toBe(60);
    });

    it('should not spend user quota when the type limit refuses', () => {
      const notification = buildNotification({ type: 'trading_alert' });

      expect(limiter.checkLimits(notification).allowed).toBe(true);
      const refused = limiter.checkLimits(notification);

      expect(refused.allowed).toBe(false);
      expect(refused.key).toBe('type:trading_alert');
      expect(limiter.getUsage('user:user-1', 60)).toBe(1);
    });

    it('should free quota once hits leave the window', () => {
      const notification = buildNotification();
      limiter.checkLimits(notification);
      limiter.checkLimits(notification);

      clock.advance(59000);
      expect(limiter.checkLimits(notification).allowed).toBe(false);

      clock.advance(1000);
      expect(limiter.checkLimits(notification).allowed).toBe(true);
    });
  });

  describe('checkChannel', () => {
    it('should limit configured channels only', () => {
      expect(limiter.checkChannel('email').allowed).toBe(true);
      expect(limiter.checkChannel('email').allowed).toBe(false);

      for (let i = 0; i < 5; i++) {
        expect(limiter.checkChannel('push').allowed).toBe(true);
      }
    });
  });

  describe('checkFrequency', () => {
    it('should cap sends per user and type within an hour', () => {
      expect(limiter.checkFrequency('user-1', 'custom', 2).allowed).toBe(true);
      expect(limiter.checkFrequency('user-1', 'custom', 2).allowed).toBe(true);

      const refused = limiter.checkFrequency('user-1', 'custom', 2);
      expect(refused.allowed).toBe(false);
      expect(refused.key).toBe('pref:user-1:custom');
      expect(refused.retryAfter).toBe(3600);

      expect(limiter.checkFrequency('user-2', 'custom', 2).allowed).toBe(true);
    });
  });

  describe('reset', () => {
    it('should clear a single key or everything', () => {
      limiter.checkChannel('email');
      limiter.reset('channel:email');
      expect(limiter.checkChannel('email').allowed).toBe(true);

      limiter.checkLimits(buildNotification());
      limiter.reset();
      expect(limiter.getUsage('user:user-1', 60)).toBe(0);
    });
  });
});
