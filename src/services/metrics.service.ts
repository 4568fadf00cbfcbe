import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
import { logger } from '../config/logger';
import { NotificationChannel, NotificationType } from '../types/notification.types';

export type AttemptOutcome = 'delivered' | 'failed' | 'retrying';

export class MetricsService {
  private registry: Registry;

  // Counters (monotonically increasing)
  public notificationsSubmittedTotal: Counter;
  public deliveryAttemptsTotal: Counter;
  public rateLimitedTotal: Counter;
  public notificationsRejectedTotal: Counter;
  public scheduleFiringsTotal: Counter;

  // Gauges (can go up or down)
  public queueDepth: Gauge;
  public inFlightDeliveries: Gauge;
  public channelStatus: Gauge;

  // Histograms (distribution of values)
  public sendDuration: Histogram;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.notificationsSubmittedTotal = new Counter({
      name: 'notifications_submitted_total',
      help: 'Notifications accepted by the delivery engine',
      labelNames: ['type'],
      registers: [this.registry],
    });

    this.deliveryAttemptsTotal = new Counter({
      name: 'notification_delivery_attempts_total',
      help: 'Channel delivery attempts by outcome',
      labelNames: ['channel', 'outcome'],
      registers: [this.registry],
    });

    this.rateLimitedTotal = new Counter({
      name: 'notification_rate_limited_total',
      help: 'Deliveries dropped by a rate limit',
      labelNames: ['scope'],
      registers: [this.registry],
    });

    this.notificationsRejectedTotal = new Counter({
      name: 'notifications_rejected_total',
      help: 'Notifications rejected before dispatch',
      labelNames: ['reason'],
      registers: [this.registry],
    });

    this.scheduleFiringsTotal = new Counter({
      name: 'notification_schedule_firings_total',
      help: 'Schedule entries fired by kind and result',
      labelNames: ['kind', 'result'],
      registers: [this.registry],
    });

    this.queueDepth = new Gauge({
      name: 'notification_queue_depth',
      help: 'Current notification queue depth',
      labelNames: ['queue_type'],
      registers: [this.registry],
    });

    this.inFlightDeliveries = new Gauge({
      name: 'notification_in_flight',
      help: 'Submissions and retries currently being processed',
      registers: [this.registry],
    });

    this.channelStatus = new Gauge({
      name: 'notification_channel_status',
      help: 'Channel health status (0=down, 1=up)',
      labelNames: ['channel'],
      registers: [this.registry],
    });

    this.sendDuration = new Histogram({
      name: 'notification_send_duration_seconds',
      help: 'Time spent in a single channel send',
      labelNames: ['channel'],
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    logger.info('Metrics service initialized');
  }

  recordSubmitted(type: NotificationType): void {
    this.notificationsSubmittedTotal.inc({ type });
  }

  recordAttempt(channel: NotificationChannel, outcome: AttemptOutcome): void {
    this.deliveryAttemptsTotal.inc({ channel, outcome });
  }

  recordRateLimited(scope: string): void {
    this.rateLimitedTotal.inc({ scope });
  }

  recordRejected(reason: string): void {
    this.notificationsRejectedTotal.inc({ reason });
  }

  recordScheduleFiring(kind: string, result: 'success' | 'failure'): void {
    this.scheduleFiringsTotal.inc({ kind, result });
  }

  setQueueDepth(queueType: 'delivery' | 'retry', depth: number): void {
    this.queueDepth.set({ queue_type: queueType }, depth);
  }

  setInFlight(count: number): void {
    this.inFlightDeliveries.set(count);
  }

  setChannelStatus(channel: NotificationChannel, isUp: boolean): void {
    this.channelStatus.set({ channel }, isUp ? 1 : 0);
  }

  /** Returns a function that records the elapsed time when called */
  startSendTimer(channel: NotificationChannel): () => void {
    const end = this.sendDuration.startTimer({ channel });
    return () => {
      end();
    };
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  async getMetricValue(name: string, labels: Record<string, string> = {}): Promise<number> {
    const metric = this.registry.getSingleMetric(name);
    if (!metric) {
      return 0;
    }
    const { values } = await metric.get();
    for (const v of values) {
      if (Object.entries(labels).every(([key, value]) => v.labels[key] === value)) {
        return v.value;
      }
    }
    return 0;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}

export const metricsService = new MetricsService();
