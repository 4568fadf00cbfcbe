import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { createLogger } from '../config/logger';
import { ValidationError, errorMessage } from '../errors';
import { MetricsService, metricsService } from './metrics.service';
import { Clock, Notification, systemClock } from '../types/notification.types';
import { CronSchedule, nextCronOccurrence, parseCronExpression } from '../utils/cron';

const log = createLogger('scheduler');

export type OneOffStatus = 'scheduled' | 'processing' | 'completed' | 'failed' | 'cancelled';
export type RecurringStatus = 'active' | 'expired' | 'cancelled' | 'failed';
export type ScheduleStatus = OneOffStatus | RecurringStatus;

export interface ScheduleEntryBase {
  scheduleId: string;
  notification: Notification;
  nextRun: Date | null;
  lastRun?: Date;
  runCount: number;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface OneOffScheduleEntry extends ScheduleEntryBase {
  kind: 'one-off';
  status: OneOffStatus;
  scheduledAt: Date;
}

export interface RecurringScheduleEntry extends ScheduleEntryBase {
  kind: 'recurring';
  status: RecurringStatus;
  cronExpression: string;
  startDate: Date;
  endDate?: Date;
}

export type ScheduleEntry = OneOffScheduleEntry | RecurringScheduleEntry;

export type ScheduleCallback = (notification: Notification, entry: ScheduleEntry) => Promise<void>;

export interface SchedulerOptions {
  clock?: Clock;
  tickIntervalMs?: number;
  retentionDays?: number;
  metrics?: MetricsService;
}

const TERMINAL_STATUSES: ReadonlySet<ScheduleStatus> = new Set<ScheduleStatus>([
  'completed',
  'failed',
  'cancelled',
  'expired',
]);

export function isTerminalStatus(status: ScheduleStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Holds one-off and recurring schedule entries and fires them through a
 * single callback. Time only moves through `tick`, which the interval loop
 * calls once per tick period; tests drive it directly with their own clock.
 */
export class NotificationScheduler {
  private readonly entries = new Map<string, ScheduleEntry>();
  private readonly cronCache = new Map<string, CronSchedule>();
  private readonly clock: Clock;
  private readonly tickIntervalMs: number;
  private readonly retentionMs: number;
  private readonly metrics: MetricsService;
  private callback: ScheduleCallback | null = null;
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;

  constructor(options: SchedulerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.tickIntervalMs = options.tickIntervalMs ?? env.SCHEDULER_TICK_MS;
    this.retentionMs = (options.retentionDays ?? env.SCHEDULE_RETENTION_DAYS) * 24 * 3600 * 1000;
    this.metrics = options.metrics ?? metricsService;
  }

  setCallback(callback: ScheduleCallback): void {
    this.callback = callback;
  }

  schedule(notification: Notification, at: Date): string {
    if (isNaN(at.getTime())) {
      throw new ValidationError('Schedule time must be a valid date');
    }
    const now = this.clock();
    const entry: OneOffScheduleEntry = {
      kind: 'one-off',
      scheduleId: uuidv4(),
      notification,
      status: 'scheduled',
      scheduledAt: at,
      nextRun: at,
      runCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.entries.set(entry.scheduleId, entry);

    log.info('Notification scheduled', {
      scheduleId: entry.scheduleId,
      notificationId: notification.id,
      scheduledAt: at.toISOString(),
    });
    return entry.scheduleId;
  }

  scheduleRecurring(
    notification: Notification,
    cronExpression: string,
    startDate?: Date,
    endDate?: Date
  ): string {
    const cron = this.parse(cronExpression);
    const now = this.clock();
    const start = startDate ?? now;
    if (endDate && endDate.getTime() <= start.getTime()) {
      throw new ValidationError('Recurring schedule must end after it starts', {
        startDate: start.toISOString(),
        endDate: endDate.toISOString(),
      });
    }

    // First occurrence at or after the start minute
    const nextRun = nextCronOccurrence(cron, new Date(start.getTime() - 1));
    const entry: RecurringScheduleEntry = {
      kind: 'recurring',
      scheduleId: uuidv4(),
      notification,
      status: 'active',
      cronExpression: cron.expression,
      startDate: start,
      endDate,
      nextRun,
      runCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.entries.set(entry.scheduleId, entry);

    log.info('Recurring notification scheduled', {
      scheduleId: entry.scheduleId,
      notificationId: notification.id,
      cronExpression: entry.cronExpression,
      nextRun: nextRun.toISOString(),
    });
    return entry.scheduleId;
  }

  /**
   * Cancel an entry that has not started firing. Returns false for unknown
   * ids and for entries past the scheduled/active state.
   */
  cancel(scheduleId: string): boolean {
    const entry = this.entries.get(scheduleId);
    if (!entry) {
      return false;
    }
    if (entry.status !== 'scheduled' && entry.status !== 'active') {
      return false;
    }

    entry.status = 'cancelled';
    entry.nextRun = null;
    entry.updatedAt = this.clock();
    log.info('Schedule cancelled', { scheduleId });
    return true;
  }

  get(scheduleId: string): ScheduleEntry | undefined {
    return this.entries.get(scheduleId);
  }

  list(status?: ScheduleStatus): ScheduleEntry[] {
    const all = [...this.entries.values()];
    return status ? all.filter((entry) => entry.status === status) : all;
  }

  getStats(): Record<ScheduleStatus, number> & { total: number } {
    const stats = {
      total: this.entries.size,
      scheduled: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      active: 0,
      expired: 0,
    };
    for (const entry of this.entries.values()) {
      stats[entry.status]++;
    }
    return stats;
  }

  /**
   * Fire every entry due at `now`. Due entries fire concurrently; one
   * entry's failure does not affect the others. Returns how many fired.
   */
  async tick(now: Date = this.clock()): Promise<number> {
    const due: ScheduleEntry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'recurring' && entry.status === 'active' && this.pastEnd(entry, now)) {
        this.expire(entry, now);
        continue;
      }
      if (this.isDue(entry, now)) {
        due.push(entry);
      }
    }

    const fired = await Promise.all(
      due.map((entry) => (entry.kind === 'one-off' ? this.fireOnce(entry, now) : this.fireRecurring(entry, now)))
    );
    return fired.filter(Boolean).length;
  }

  /** Drop terminal entries not updated within the retention window */
  sweep(now: Date = this.clock()): number {
    const cutoff = now.getTime() - this.retentionMs;
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (isTerminalStatus(entry.status) && entry.updatedAt.getTime() < cutoff) {
        this.entries.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      log.info('Swept finished schedules', { removed });
    }
    return removed;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.runTick(), this.tickIntervalMs);
    log.info('Scheduler started', { tickIntervalMs: this.tickIntervalMs });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Scheduler stopped');
    }
    if (this.ticking) {
      await this.ticking;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  private runTick(): void {
    // A slow tick is never overlapped by the next one
    if (this.ticking) {
      return;
    }
    this.ticking = this.tick()
      .then(() => undefined)
      .catch((error) => {
        log.error('Scheduler tick failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.ticking = null;
      });
  }

  private isDue(entry: ScheduleEntry, now: Date): boolean {
    if (entry.kind === 'one-off') {
      return entry.status === 'scheduled' && entry.scheduledAt.getTime() <= now.getTime();
    }
    return entry.status === 'active' && entry.nextRun !== null && entry.nextRun.getTime() <= now.getTime();
  }

  private pastEnd(entry: RecurringScheduleEntry, now: Date): boolean {
    return entry.endDate !== undefined && now.getTime() > entry.endDate.getTime();
  }

  private expire(entry: RecurringScheduleEntry, now: Date): void {
    entry.status = 'expired';
    entry.nextRun = null;
    entry.updatedAt = now;
    log.info('Recurring schedule expired', { scheduleId: entry.scheduleId, runCount: entry.runCount });
  }

  private async fireOnce(entry: OneOffScheduleEntry, now: Date): Promise<boolean> {
    entry.status = 'processing';
    entry.updatedAt = now;

    try {
      await this.invoke(entry);
      entry.status = 'completed';
      entry.lastRun = now;
      entry.runCount++;
      this.metrics.recordScheduleFiring('one-off', 'success');
      return true;
    } catch (error) {
      entry.status = 'failed';
      entry.error = errorMessage(error);
      this.metrics.recordScheduleFiring('one-off', 'failure');
      log.error('Scheduled notification failed', {
        scheduleId: entry.scheduleId,
        error: entry.error,
      });
      return false;
    } finally {
      entry.nextRun = null;
      entry.updatedAt = this.clock();
    }
  }

  private async fireRecurring(entry: RecurringScheduleEntry, now: Date): Promise<boolean> {
    let failure: string | undefined;
    try {
      await this.invoke(entry);
      this.metrics.recordScheduleFiring('recurring', 'success');
    } catch (error) {
      failure = errorMessage(error);
      this.metrics.recordScheduleFiring('recurring', 'failure');
    }

    entry.lastRun = now;
    entry.runCount++;
    entry.updatedAt = this.clock();

    // Cancelled while the callback ran
    if (entry.status !== 'active') {
      return failure === undefined;
    }

    if (failure !== undefined) {
      entry.status = 'failed';
      entry.error = failure;
      entry.nextRun = null;
      log.error('Recurring notification failed', { scheduleId: entry.scheduleId, error: failure });
      return false;
    }

    const next = nextCronOccurrence(this.parse(entry.cronExpression), now);
    if (entry.endDate && next.getTime() > entry.endDate.getTime()) {
      this.expire(entry, entry.updatedAt);
    } else {
      entry.nextRun = next;
    }
    return true;
  }

  private async invoke(entry: ScheduleEntry): Promise<void> {
    if (!this.callback) {
      throw new Error('No dispatch callback registered');
    }
    await this.callback(entry.notification, entry);
  }

  private parse(expression: string): CronSchedule {
    const cached = this.cronCache.get(expression);
    if (cached) {
      return cached;
    }
    const parsed = parseCronExpression(expression);
    this.cronCache.set(expression, parsed);
    return parsed;
  }
}
