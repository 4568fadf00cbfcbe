import { DateTime } from 'luxon';
import { createLogger } from '../config/logger';
import { errorMessage } from '../errors';
import { HistoryStore } from '../stores/store.types';
import {
  ChannelStatusCounts,
  Clock,
  DeliveryRecord,
  HourlyBucket,
  Notification,
  NotificationChannel,
  NotificationMetrics,
  NotificationType,
  RealTimeStats,
  systemClock,
} from '../types/notification.types';

const log = createLogger('analytics-tracker');

const HOUR_KEY_FORMAT = 'yyyy-MM-dd-HH';
const MAX_EVENTS = 100000;

type Outcome = keyof ChannelStatusCounts;

interface OutcomeEvent {
  at: number;
  channel: NotificationChannel;
  type: NotificationType;
  outcome: Outcome;
  latencyMs?: number;
}

export interface ChannelFailureStats {
  channel: NotificationChannel;
  totalSent: number;
  failed: number;
  failureRate: number;
}

export interface AnalyticsTrackerOptions {
  historyStore?: HistoryStore;
  clock?: Clock;
  retentionHours?: number;
}

function emptyCounts(): ChannelStatusCounts {
  return { sent: 0, delivered: 0, failed: 0 };
}

export function hourKey(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat(HOUR_KEY_FORMAT);
}

function rate(delivered: number, sent: number): number {
  return sent > 0 ? delivered / sent : 0;
}

/**
 * Running delivery counters plus hourly snapshots of them.
 *
 * Counters are per record (one record is one channel of one notification).
 * A record still waiting on a retry is counted as sent only; its final
 * outcome arrives later through recordDelivered / recordFailed.
 */
export class AnalyticsTracker {
  private readonly historyStore?: HistoryStore;
  private readonly clock: Clock;
  private readonly retentionMs: number;

  private totals: ChannelStatusCounts = emptyCounts();
  private totalRateLimited = 0;
  private channelStats = new Map<NotificationChannel, ChannelStatusCounts>();
  private typeStats = new Map<NotificationType, ChannelStatusCounts>();
  private hourly = new Map<string, HourlyBucket>();
  private events: OutcomeEvent[] = [];
  // Records counted as sent while a retry was still pending
  private readonly awaitingOutcome = new Set<string>();
  private lastAggregatedAt: Date;

  constructor(options: AnalyticsTrackerOptions = {}) {
    this.historyStore = options.historyStore;
    this.clock = options.clock ?? systemClock;
    this.retentionMs = (options.retentionHours ?? 24) * 3600 * 1000;
    this.lastAggregatedAt = this.clock();
  }

  async recordSent(notification: Notification, records: DeliveryRecord[]): Promise<void> {
    for (const record of records) {
      if (record.metadata.rateLimited === true) {
        this.totalRateLimited++;
        continue;
      }
      this.count(record, notification.type, 'sent');
      if (record.status === 'delivered') {
        this.count(record, notification.type, 'delivered');
      } else if (record.status === 'failed' && record.nextRetryAt === undefined) {
        this.count(record, notification.type, 'failed');
      } else {
        this.awaitingOutcome.add(record.id);
      }
    }

    await this.persist(records);
    log.debug('Tracked notification sent', {
      notificationId: notification.id,
      records: records.length,
    });
  }

  /** Final success of a record that needed retries */
  async recordDelivered(record: DeliveryRecord, type: NotificationType): Promise<void> {
    this.awaitingOutcome.delete(record.id);
    this.count(record, type, 'delivered');
    await this.persist([record]);
  }

  /** Final failure of a record that needed retries */
  async recordFailed(record: DeliveryRecord, type: NotificationType): Promise<void> {
    this.awaitingOutcome.delete(record.id);
    this.count(record, type, 'failed');
    await this.persist([record]);
  }

  /** True when the record was counted as sent and its final outcome is still owed */
  awaitsOutcome(recordId: string): boolean {
    return this.awaitingOutcome.has(recordId);
  }

  /**
   * Snapshot running totals into the current UTC hour bucket and drop
   * buckets and events older than the retention window.
   */
  aggregate(now: Date = this.clock()): void {
    this.hourly.set(hourKey(now), { ...this.totals });

    const cutoff = now.getTime() - this.retentionMs;
    const cutoffKey = hourKey(new Date(cutoff));
    for (const key of [...this.hourly.keys()]) {
      if (key < cutoffKey) {
        this.hourly.delete(key);
      }
    }
    this.events = this.events.filter((event) => event.at >= cutoff);

    this.lastAggregatedAt = now;
  }

  /**
   * Metrics over outcomes recorded in [start, end]. Outcomes older than the
   * retention window have been evicted and no longer contribute.
   */
  getMetrics(
    start: Date,
    end: Date,
    type?: NotificationType,
    channel?: NotificationChannel
  ): NotificationMetrics {
    const from = start.getTime();
    const to = end.getTime();
    const totals = emptyCounts();
    const channelMetrics: Partial<Record<NotificationChannel, ChannelStatusCounts>> = {};
    const typeMetrics: Partial<Record<NotificationType, ChannelStatusCounts>> = {};
    let latencyTotal = 0;
    let latencyCount = 0;

    for (const event of this.events) {
      if (event.at < from || event.at > to) continue;
      if (type && event.type !== type) continue;
      if (channel && event.channel !== channel) continue;

      totals[event.outcome]++;
      const channelCounts = channelMetrics[event.channel] ?? emptyCounts();
      channelCounts[event.outcome]++;
      channelMetrics[event.channel] = channelCounts;
      const typeCounts = typeMetrics[event.type] ?? emptyCounts();
      typeCounts[event.outcome]++;
      typeMetrics[event.type] = typeCounts;

      if (event.latencyMs !== undefined) {
        latencyTotal += event.latencyMs;
        latencyCount++;
      }
    }

    const firstHour = hourKey(start);
    const lastHour = hourKey(end);
    const hourly: Record<string, HourlyBucket> = {};
    for (const [key, bucket] of this.hourly) {
      if (key >= firstHour && key <= lastHour) {
        hourly[key] = { ...bucket };
      }
    }

    return {
      totalSent: totals.sent,
      totalDelivered: totals.delivered,
      totalFailed: totals.failed,
      deliveryRate: rate(totals.delivered, totals.sent),
      averageDeliveryTimeMs: latencyCount > 0 ? latencyTotal / latencyCount : 0,
      channelMetrics,
      typeMetrics,
      periodStart: start,
      periodEnd: end,
      hourly,
    };
  }

  getRealTimeStats(): RealTimeStats {
    return {
      totalSent: this.totals.sent,
      totalDelivered: this.totals.delivered,
      totalFailed: this.totals.failed,
      totalRateLimited: this.totalRateLimited,
      deliveryRate: rate(this.totals.delivered, this.totals.sent),
      channelStats: this.snapshot(this.channelStats),
      typeStats: this.snapshot(this.typeStats),
      lastAggregatedAt: this.lastAggregatedAt,
    };
  }

  /** The last `hours` hour buckets, newest first, zero-filled where missing */
  getHourlyStats(hours: number = 24, now: Date = this.clock()): Record<string, HourlyBucket> {
    const stats: Record<string, HourlyBucket> = {};
    for (let i = 0; i < hours; i++) {
      const key = hourKey(new Date(now.getTime() - i * 3600 * 1000));
      const bucket = this.hourly.get(key);
      stats[key] = bucket ? { ...bucket } : { sent: 0, delivered: 0, failed: 0 };
    }
    return stats;
  }

  getTopFailingChannels(limit: number = 5): ChannelFailureStats[] {
    const failing: ChannelFailureStats[] = [];
    for (const [channel, stats] of this.channelStats) {
      if (stats.sent > 0) {
        failing.push({
          channel,
          totalSent: stats.sent,
          failed: stats.failed,
          failureRate: stats.failed / stats.sent,
        });
      }
    }
    failing.sort((a, b) => b.failureRate - a.failureRate);
    return failing.slice(0, limit);
  }

  reset(): void {
    this.totals = emptyCounts();
    this.totalRateLimited = 0;
    this.channelStats.clear();
    this.typeStats.clear();
    this.hourly.clear();
    this.events = [];
    this.awaitingOutcome.clear();
    this.lastAggregatedAt = this.clock();
    log.info('Analytics stats reset');
  }

  private count(record: DeliveryRecord, type: NotificationType, outcome: Outcome): void {
    this.totals[outcome]++;
    this.bump(this.channelStats, record.channel, outcome);
    this.bump(this.typeStats, type, outcome);

    const latencyMs =
      outcome === 'delivered' && record.deliveredAt && record.attempts.length > 0
        ? record.deliveredAt.getTime() - record.attempts[0].getTime()
        : undefined;

    this.events.push({
      at: this.clock().getTime(),
      channel: record.channel,
      type,
      outcome,
      latencyMs,
    });
    if (this.events.length > MAX_EVENTS) {
      this.events.shift();
    }
  }

  private bump<K>(stats: Map<K, ChannelStatusCounts>, key: K, outcome: Outcome): void {
    let counts = stats.get(key);
    if (!counts) {
      counts = emptyCounts();
      stats.set(key, counts);
    }
    counts[outcome]++;
  }

  private snapshot<K extends string>(stats: Map<K, ChannelStatusCounts>): Partial<Record<K, ChannelStatusCounts>> {
    const copy: Partial<Record<K, ChannelStatusCounts>> = {};
    for (const [key, counts] of stats) {
      copy[key] = { ...counts };
    }
    return copy;
  }

  private async persist(records: DeliveryRecord[]): Promise<void> {
    const store = this.historyStore;
    if (!store) {
      return;
    }
    try {
      await Promise.all(records.map((record) => store.saveHistory(record)));
    } catch (error) {
      log.error('Failed to save delivery history', { error: errorMessage(error) });
    }
  }
}
