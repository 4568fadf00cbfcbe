import { describe, it, expect } from '@jest/globals';
import { AnalyticsAggregationJob, ScheduleSweepJob } from '../../../src/jobs/maintenance.jobs';
import { AnalyticsTracker } from '../../../src/services/analytics-tracker';
import { NotificationScheduler } from '../../../src/services/scheduler.service';
import { ManualClock, T0, buildNotification } from '../../helpers/fixtures';

describe('Maintenance jobs', () => {
  describe('ScheduleSweepJob', () => {
    it('should remove cancelled schedules past retention', async () => {
      const clock = new ManualClock();
      const scheduler = new NotificationScheduler({ clock: clock.now, retentionDays: 1 });
      const id = scheduler.schedule(buildNotification(), new Date(T0.getTime() + 3600 * 1000));
      scheduler.cancel(id);
      const job = new ScheduleSweepJob(scheduler);

      expect(await job.runNow()).toEqual({ removed: 0 });

      clock.advance(2 * 24 * 3600 * 1000);
      expect(await job.runNow()).toEqual({ removed: 1 });
      expect(scheduler.get(id)).toBeUndefined();
    });

    it('should start and stop its cron task', () => {
      const job = new ScheduleSweepJob(new NotificationScheduler());

      job.start();
      expect(job.isRunning).toBe(true);

      job.stop();
      expect(job.isRunning).toBe(false);
    });
  });

  describe('AnalyticsAggregationJob', () => {
    it('should aggregate and report the current totals', async () => {
      const clock = new ManualClock();
      const analytics = new AnalyticsTracker({ clock: clock.now });
      clock.advance(60 * 1000);

      const result = await new AnalyticsAggregationJob(analytics).runNow();

      expect(result).toEqual({ totalSent: 0, lastAggregatedAt: '2026-01-01T10:01:00.000Z' });
      expect(analytics.getHourlyStats(1)).toEqual({
        '2026-01-01-10': { sent: 0, delivered: 0, failed: 0 },
      });
    });
  });
});
