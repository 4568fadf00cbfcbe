import cron from 'node-cron';
import { createLogger } from '../config/logger';
import { logError } from '../errors';
import { AnalyticsTracker } from '../services/analytics-tracker';
import { NotificationManager } from '../services/notification-manager';
import { NotificationScheduler } from '../services/scheduler.service';

const log = createLogger('maintenance-jobs');

/**
 * Shared start/stop/runNow plumbing for periodic maintenance work.
 */
abstract class MaintenanceJob {
  private task: cron.ScheduledTask | null = null;

  protected abstract readonly name: string;
  protected abstract readonly cronExpression: string;

  protected abstract run(): Promise<Record<string, unknown>>;

  start(): void {
    if (this.task) {
      return;
    }
    this.task = cron.schedule(this.cronExpression, async () => {
      try {
        const result = await this.run();
        log.debug(`${this.name} completed`, result);
      } catch (error) {
        logError(`${this.name} failed`, error, { job: this.name });
      }
    });
    log.info(`${this.name} job started`, { cron: this.cronExpression });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      log.info(`${this.name} job stopped`);
    }
  }

  get isRunning(): boolean {
    return this.task !== null;
  }

  /** Run once immediately, outside the cron schedule */
  async runNow(): Promise<Record<string, unknown>> {
    log.info(`Running ${this.name} manually`);
    try {
      return await this.run();
    } catch (error) {
      log.error(`Manual ${this.name} failed`, { error });
      throw error;
    }
  }
}

/** Snapshots analytics into hourly buckets every minute */
export class AnalyticsAggregationJob extends MaintenanceJob {
  protected readonly name = 'Analytics aggregation';
  protected readonly cronExpression = '* * * * *';

  constructor(private readonly analytics: AnalyticsTracker) {
    super();
  }

  protected async run(): Promise<Record<string, unknown>> {
    this.analytics.aggregate();
    const stats = this.analytics.getRealTimeStats();
    return { totalSent: stats.totalSent, lastAggregatedAt: stats.lastAggregatedAt.toISOString() };
  }
}

/** Removes finished schedule entries past retention, hourly */
export class ScheduleSweepJob extends MaintenanceJob {
  protected readonly name = 'Schedule sweep';
  protected readonly cronExpression = '0 * * * *';

  constructor(private readonly scheduler: NotificationScheduler) {
    super();
  }

  protected async run(): Promise<Record<string, unknown>> {
    return { removed: this.scheduler.sweep() };
  }
}

/** Re-submits notifications that failed for good in the last hour */
export class FailedRetryJob extends MaintenanceJob {
  protected readonly name = 'Failed notification retry';
  protected readonly cronExpression = '*/15 * * * *';

  constructor(
    private readonly manager: NotificationManager,
    private readonly hoursBack: number = 1
  ) {
    super();
  }

  protected async run(): Promise<Record<string, unknown>> {
    return { resubmitted: await this.manager.retryFailed(undefined, this.hoursBack) };
  }
}
