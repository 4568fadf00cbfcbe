import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { createLogger } from '../config/logger';
import { ScheduleNotFoundError, ValidationError, errorMessage } from '../errors';
import { AnalyticsTracker } from './analytics-tracker';
import { DeliveryEngine } from './delivery-engine';
import { PreferenceStore, PreferenceUpdate } from './preference-store';
import { RateLimiter } from './rate-limiter';
import { NotificationScheduler, ScheduleEntry, ScheduleStatus } from './scheduler.service';
import { TemplateRenderer } from './template-renderer';
import { comparePriority, validateNotification } from '../schemas/validation';
import { HistoryStore } from '../stores/store.types';
import { isFinalFailure, latestPerChannel } from '../stores/memory-history.store';
import {
  ChannelStatusEntry,
  Clock,
  DeliveryRecord,
  Notification,
  NotificationChannel,
  NotificationMetrics,
  NotificationStatus,
  NotificationType,
  Preference,
  RealTimeStats,
  systemClock,
} from '../types/notification.types';
import { sleep } from '../utils/timeout';

const log = createLogger('notification-manager');

export interface NotificationManagerOptions {
  engine: DeliveryEngine;
  scheduler: NotificationScheduler;
  preferences: PreferenceStore;
  analytics: AnalyticsTracker;
  rateLimiter: RateLimiter;
  historyStore: HistoryStore;
  templateRenderer?: TemplateRenderer;
  clock?: Clock;
  bulkBatchSize?: number;
  bulkBatchPauseMs?: number;
}

export type BulkSendResult = Record<string, DeliveryRecord[]>;

/**
 * Entry point for callers: filters by preference, defers future sends to the
 * scheduler, dispatches the rest through the delivery engine and reports
 * every outcome to analytics and the history store.
 */
export class NotificationManager {
  private readonly engine: DeliveryEngine;
  private readonly scheduler: NotificationScheduler;
  private readonly preferences: PreferenceStore;
  private readonly analytics: AnalyticsTracker;
  private readonly rateLimiter: RateLimiter;
  private readonly historyStore: HistoryStore;
  private readonly templateRenderer?: TemplateRenderer;
  private readonly clock: Clock;
  private readonly bulkBatchSize: number;
  private readonly bulkBatchPauseMs: number;

  // Pending records created for one-off schedules, by schedule id
  private readonly scheduledRecords = new Map<string, DeliveryRecord[]>();
  private readonly unsubscribe: () => void;

  constructor(options: NotificationManagerOptions) {
    this.engine = options.engine;
    this.scheduler = options.scheduler;
    this.preferences = options.preferences;
    this.analytics = options.analytics;
    this.rateLimiter = options.rateLimiter;
    this.historyStore = options.historyStore;
    this.templateRenderer = options.templateRenderer;
    this.clock = options.clock ?? systemClock;
    this.bulkBatchSize = options.bulkBatchSize ?? env.BULK_BATCH_SIZE;
    this.bulkBatchPauseMs = options.bulkBatchPauseMs ?? env.BULK_BATCH_PAUSE_MS;

    this.scheduler.setCallback((notification, entry) => this.dispatchScheduled(notification, entry));
    this.unsubscribe = this.engine.onRecordUpdate((record, notification) =>
      this.handleRecordUpdate(record, notification)
    );
  }

  initialize(): void {
    this.engine.start();
    this.scheduler.start();
    log.info('Notification manager initialized');
  }

  async shutdown(): Promise<void> {
    await this.scheduler.stop();
    await this.engine.stop();
    this.unsubscribe();
    log.info('Notification manager shut down');
  }

  /**
   * Deliver a notification, or defer it when scheduledAt is in the future.
   * Throws only when the notification itself is invalid; channel failures
   * are reported in the returned records.
   */
  async send(notification: Notification): Promise<DeliveryRecord[]> {
    const now = this.clock();
    validateNotification(notification, now);

    const preference = await this.preferences.get(notification.userId, notification.type);
    const channels = this.allowedChannels(notification, preference, now);
    if (channels.length === 0) {
      return [];
    }

    if (notification.scheduledAt && notification.scheduledAt.getTime() > now.getTime()) {
      const { records } = await this.defer(notification, channels, notification.scheduledAt);
      return records;
    }

    if (!this.withinFrequencyLimit(notification, preference, now)) {
      return [];
    }
    return this.dispatch(notification, channels, preference);
  }

  async sendBulk(notifications: Notification[]): Promise<BulkSendResult> {
    const results: BulkSendResult = {};

    for (let i = 0; i < notifications.length; i += this.bulkBatchSize) {
      const batch = notifications.slice(i, i + this.bulkBatchSize);
      const settled = await Promise.allSettled(batch.map((notification) => this.send(notification)));

      settled.forEach((outcome, index) => {
        const notification = batch[index];
        if (outcome.status === 'fulfilled') {
          results[notification.id] = outcome.value;
        } else {
          log.warn('Bulk send item failed', {
            notificationId: notification.id,
            error: errorMessage(outcome.reason),
          });
          results[notification.id] = [];
        }
      });

      if (i + this.bulkBatchSize < notifications.length) {
        await sleep(this.bulkBatchPauseMs);
      }
    }

    log.info('Bulk send completed', { total: notifications.length });
    return results;
  }

  async schedule(notification: Notification, at: Date): Promise<string> {
    const now = this.clock();
    validateNotification(notification, now);
    if (notification.expiresAt && notification.expiresAt.getTime() <= at.getTime()) {
      throw new ValidationError('Notification expires before its scheduled time', {
        notificationId: notification.id,
      });
    }

    const preference = await this.preferences.get(notification.userId, notification.type);
    const channels = this.preferenceChannels(notification, preference);
    const { scheduleId } = await this.defer({ ...notification, scheduledAt: at }, channels, at);
    return scheduleId;
  }

  scheduleRecurring(notification: Notification, cronExpression: string, startDate?: Date, endDate?: Date): string {
    validateNotification(notification, this.clock());
    return this.scheduler.scheduleRecurring(notification, cronExpression, startDate, endDate);
  }

  async cancel(scheduleId: string): Promise<boolean> {
    if (!this.scheduler.cancel(scheduleId)) {
      return false;
    }
    await this.settleScheduledRecords(scheduleId, 'cancelled', 'Schedule cancelled');
    return true;
  }

  getSchedule(scheduleId: string): ScheduleEntry {
    const entry = this.scheduler.get(scheduleId);
    if (!entry) {
      throw new ScheduleNotFoundError(scheduleId);
    }
    return entry;
  }

  listSchedules(status?: ScheduleStatus): ScheduleEntry[] {
    return this.scheduler.list(status);
  }

  /** Latest known record per channel */
  async status(notificationId: string): Promise<NotificationStatus> {
    const history = await this.historyStore.loadHistory(notificationId);
    const latest = latestPerChannel(history);

    const status: NotificationStatus = {
      notificationId,
      totalChannels: latest.size,
      delivered: 0,
      failed: 0,
      pending: 0,
      cancelled: 0,
      perChannel: [],
    };

    for (const record of latest.values()) {
      if (record.status === 'delivered') {
        status.delivered++;
      } else if (record.status === 'cancelled') {
        status.cancelled++;
      } else if (isFinalFailure(record)) {
        status.failed++;
      } else {
        status.pending++;
      }
      status.perChannel.push(this.toChannelStatus(record));
    }

    return status;
  }

  /**
   * Re-submit the channels whose latest record is a final failure within
   * the window. Returns how many notifications were re-submitted.
   */
  async retryFailed(notificationId?: string, hoursBack: number = 24): Promise<number> {
    const now = this.clock();
    const failed = await this.historyStore.loadFailed(notificationId, hoursBack, now);
    let resubmitted = 0;

    for (const notification of failed) {
      const latest = latestPerChannel(await this.historyStore.loadHistory(notification.id));
      const channels = [...latest.values()].filter(isFinalFailure).map((record) => record.channel);
      if (channels.length === 0) {
        continue;
      }

      try {
        const preference = await this.preferences.get(notification.userId, notification.type);
        const retry = { ...notification, channels };
        const allowed = this.allowedChannels(retry, preference, now);
        if (allowed.length === 0 || !this.withinFrequencyLimit(retry, preference, now)) {
          log.debug('Retry suppressed by preferences', { notificationId: notification.id });
          continue;
        }
        await this.dispatch({ ...retry, channels: allowed }, allowed, preference);
        resubmitted++;
      } catch (error) {
        log.warn('Could not retry failed notification', {
          notificationId: notification.id,
          error: errorMessage(error),
        });
      }
    }

    log.info('Retried failed notifications', { found: failed.length, resubmitted });
    return resubmitted;
  }

  stats(): RealTimeStats {
    return this.analytics.getRealTimeStats();
  }

  metrics(start: Date, end: Date, type?: NotificationType, channel?: NotificationChannel): NotificationMetrics {
    return this.analytics.getMetrics(start, end, type, channel);
  }

  async getPreferences(userId: string): Promise<Preference[]> {
    return this.preferences.getAll(userId);
  }

  async updatePreference(userId: string, type: NotificationType, changes: PreferenceUpdate): Promise<Preference> {
    return this.preferences.update(userId, type, changes);
  }

  private preferenceChannels(notification: Notification, preference: Preference): NotificationChannel[] {
    if (!preference.enabled) {
      return [];
    }
    if (comparePriority(notification.priority, preference.priorityThreshold) < 0) {
      return [];
    }
    return notification.channels.filter((channel) => preference.channels.includes(channel));
  }

  private allowedChannels(notification: Notification, preference: Preference, now: Date): NotificationChannel[] {
    const channels = this.preferenceChannels(notification, preference);
    if (channels.length > 0 && this.preferences.isQuietHours(preference, now)) {
      log.info('Notification suppressed by quiet hours', {
        notificationId: notification.id,
        userId: notification.userId,
      });
      return [];
    }
    return channels;
  }

  private withinFrequencyLimit(notification: Notification, preference: Preference, now: Date): boolean {
    if (preference.frequencyLimit === undefined) {
      return true;
    }
    const result = this.rateLimiter.checkFrequency(
      notification.userId,
      notification.type,
      preference.frequencyLimit,
      now
    );
    if (!result.allowed) {
      log.info('Notification suppressed by frequency limit', {
        notificationId: notification.id,
        userId: notification.userId,
        limit: preference.frequencyLimit,
      });
    }
    return result.allowed;
  }

  private async dispatch(
    notification: Notification,
    channels: NotificationChannel[],
    preference: Preference
  ): Promise<DeliveryRecord[]> {
    const rendered = await this.render(notification);
    await this.saveNotification(rendered);

    let records: DeliveryRecord[];
    try {
      records = await this.engine.submit(rendered, channels, preference);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      log.error('Delivery engine refused notification', {
        notificationId: notification.id,
        error: errorMessage(error),
      });
      records = this.refusedRecords(rendered, channels, errorMessage(error));
    }

    await this.analytics.recordSent(rendered, records);
    return records;
  }

  private async render(notification: Notification): Promise<Notification> {
    if (!notification.templateId || !this.templateRenderer) {
      return notification;
    }
    try {
      const { subject, body } = await this.templateRenderer.render(
        notification.templateId,
        notification.templateData ?? {}
      );
      return { ...notification, title: subject || notification.title, body: body || notification.body };
    } catch (error) {
      log.warn('Template rendering failed, sending original content', {
        notificationId: notification.id,
        templateId: notification.templateId,
        error: errorMessage(error),
      });
      return notification;
    }
  }

  private async defer(
    notification: Notification,
    channels: NotificationChannel[],
    at: Date
  ): Promise<{ scheduleId: string; records: DeliveryRecord[] }> {
    const scheduleId = this.scheduler.schedule(notification, at);
    const now = this.clock();
    const records: DeliveryRecord[] = channels.map((channel) => ({
      id: uuidv4(),
      notificationId: notification.id,
      userId: notification.userId,
      channel,
      status: 'pending',
      retryCount: 0,
      attempts: [],
      metadata: { scheduleId, scheduledAt: at.toISOString() },
      createdAt: now,
      updatedAt: now,
    }));

    this.scheduledRecords.set(scheduleId, records);
    await this.saveNotification(notification);
    await Promise.all(records.map((record) => this.saveRecord(record)));
    return { scheduleId, records };
  }

  /**
   * Scheduler callback. One-off firings keep the notification id so status
   * queries follow it; every recurring firing is a new notification.
   */
  private async dispatchScheduled(notification: Notification, entry: ScheduleEntry): Promise<void> {
    const now = this.clock();
    const firing: Notification =
      entry.kind === 'recurring'
        ? {
            ...notification,
            id: uuidv4(),
            scheduledAt: undefined,
            createdAt: now,
            metadata: { ...notification.metadata, scheduleId: entry.scheduleId, occurrence: entry.runCount + 1 },
          }
        : { ...notification, scheduledAt: undefined };

    try {
      const records = await this.send(firing);
      const dispatched = new Set(records.map((record) => record.channel));
      await this.settleScheduledRecords(entry.scheduleId, 'cancelled', 'Suppressed at delivery time', dispatched);
    } catch (error) {
      await this.settleScheduledRecords(entry.scheduleId, 'failed', errorMessage(error));
      throw error;
    }
  }

  /** Move a schedule's still-pending placeholder records to a final state */
  private async settleScheduledRecords(
    scheduleId: string,
    status: 'cancelled' | 'failed',
    reason: string,
    superseded: ReadonlySet<NotificationChannel> = new Set()
  ): Promise<void> {
    const records = this.scheduledRecords.get(scheduleId);
    if (!records) {
      return;
    }
    this.scheduledRecords.delete(scheduleId);

    const now = this.clock();
    const settled = records.filter((record) => record.status === 'pending' && !superseded.has(record.channel));
    for (const record of settled) {
      record.status = status;
      record.errorMessage = reason;
      record.updatedAt = now;
      if (status === 'failed') {
        record.failedAt = now;
      }
    }
    await Promise.all(settled.map((record) => this.saveRecord(record)));
  }

  private handleRecordUpdate(record: DeliveryRecord, notification: Notification): void {
    const final = record.status === 'delivered' || isFinalFailure(record);
    if (final && this.analytics.awaitsOutcome(record.id)) {
      const tracked =
        record.status === 'delivered'
          ? this.analytics.recordDelivered(record, notification.type)
          : this.analytics.recordFailed(record, notification.type);
      tracked.catch((error) => {
        log.error('Failed to track retry outcome', { recordId: record.id, error: errorMessage(error) });
      });
      return;
    }
    this.saveRecord(record).catch((error) => {
      log.error('Failed to persist record update', { recordId: record.id, error: errorMessage(error) });
    });
  }

  private refusedRecords(notification: Notification, channels: NotificationChannel[], reason: string): DeliveryRecord[] {
    const now = this.clock();
    return channels.map((channel) => ({
      id: uuidv4(),
      notificationId: notification.id,
      userId: notification.userId,
      channel,
      status: 'failed',
      failedAt: now,
      errorMessage: reason,
      retryCount: 0,
      attempts: [],
      metadata: { refused: true },
      createdAt: now,
      updatedAt: now,
    }));
  }

  private toChannelStatus(record: DeliveryRecord): ChannelStatusEntry {
    return {
      channel: record.channel,
      status: record.status,
      retryCount: record.retryCount,
      sentAt: record.sentAt,
      deliveredAt: record.deliveredAt,
      failedAt: record.failedAt,
      errorMessage: record.errorMessage,
      rateLimited: record.metadata.rateLimited === true,
    };
  }

  private async saveNotification(notification: Notification): Promise<void> {
    try {
      await this.historyStore.saveNotification(notification);
    } catch (error) {
      log.error('Failed to save notification', { notificationId: notification.id, error: errorMessage(error) });
    }
  }

  private async saveRecord(record: DeliveryRecord): Promise<void> {
    try {
      await this.historyStore.saveHistory(record);
    } catch (error) {
      log.error('Failed to save delivery record', { recordId: record.id, error: errorMessage(error) });
    }
  }
}
