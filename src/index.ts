import { ChannelRegistry } from './channels/channel-registry';
import { env } from './config/env';
import { RATE_LIMITS, RateLimitConfig } from './config/rate-limits';
import { AnalyticsTracker } from './services/analytics-tracker';
import { DeliveryEngine } from './services/delivery-engine';
import { MetricsService, metricsService } from './services/metrics.service';
import { NotificationManager } from './services/notification-manager';
import { PreferenceStore } from './services/preference-store';
import { RateLimiter } from './services/rate-limiter';
import { NotificationScheduler } from './services/scheduler.service';
import { TemplateRenderer } from './services/template-renderer';
import { MemoryHistoryStore } from './stores/memory-history.store';
import { MemoryPreferenceBackend } from './stores/memory-preference.backend';
import { HistoryStore, PreferenceBackend } from './stores/store.types';
import { Clock, systemClock } from './types/notification.types';

export * from './types/notification.types';
export * from './errors';
export * from './schemas/validation';
export * from './channels/base.channel';
export * from './channels/channel-registry';
export { EmailChannel, EmailTransport, sendGridTransport } from './channels/email.channel';
export { SmsChannel, SmsTransport, formatSmsBody, createTwilioTransport } from './channels/sms.channel';
export { PushChannel } from './channels/push.channel';
export { WebhookChannel, generateSignature, verifySignature, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './channels/webhook.channel';
export * from './stores/store.types';
export { MemoryHistoryStore } from './stores/memory-history.store';
export { MemoryPreferenceBackend } from './stores/memory-preference.backend';
export * from './services/analytics-tracker';
export * from './services/delivery-engine';
export * from './services/metrics.service';
export * from './services/notification-manager';
export * from './services/preference-store';
export * from './services/rate-limiter';
export * from './services/scheduler.service';
export * from './services/template-renderer';
export * from './jobs/maintenance.jobs';
export { nextCronOccurrence, parseCronExpression, isValidCronExpression } from './utils/cron';
export { calculateBackoffSeconds, shouldRetry } from './utils/retry';

export interface NotificationServiceOptions {
  registry: ChannelRegistry;
  clock?: Clock;
  historyStore?: HistoryStore;
  preferenceBackend?: PreferenceBackend;
  rateLimits?: RateLimitConfig;
  templateRenderer?: TemplateRenderer;
  metrics?: MetricsService;
  workerCount?: number;
  queueCapacity?: number;
  retryQueueCapacity?: number;
  pollIntervalMs?: number;
  channelTimeoutMs?: number;
  schedulerTickMs?: number;
  bulkBatchSize?: number;
  bulkBatchPauseMs?: number;
}

export interface NotificationService {
  manager: NotificationManager;
  engine: DeliveryEngine;
  scheduler: NotificationScheduler;
  preferences: PreferenceStore;
  analytics: AnalyticsTracker;
  rateLimiter: RateLimiter;
  historyStore: HistoryStore;
}

/**
 * Wire the engine, scheduler, stores and trackers around one clock.
 * Nothing is started; call `manager.initialize()` to start workers.
 */
export function createNotificationService(options: NotificationServiceOptions): NotificationService {
  const clock = options.clock ?? systemClock;
  const metrics = options.metrics ?? metricsService;
  const historyStore = options.historyStore ?? new MemoryHistoryStore();
  const rateLimiter = new RateLimiter(options.rateLimits ?? RATE_LIMITS, clock);
  const preferences = new PreferenceStore(options.preferenceBackend ?? new MemoryPreferenceBackend(), { clock });
  const analytics = new AnalyticsTracker({ historyStore, clock });

  const engine = new DeliveryEngine({
    registry: options.registry,
    rateLimiter,
    metrics,
    clock,
    workerCount: options.workerCount,
    queueCapacity: options.queueCapacity,
    retryQueueCapacity: options.retryQueueCapacity,
    pollIntervalMs: options.pollIntervalMs,
    channelTimeoutMs: options.channelTimeoutMs,
  });

  const scheduler = new NotificationScheduler({
    clock,
    metrics,
    tickIntervalMs: options.schedulerTickMs ?? env.SCHEDULER_TICK_MS,
  });

  const manager = new NotificationManager({
    engine,
    scheduler,
    preferences,
    analytics,
    rateLimiter,
    historyStore,
    templateRenderer: options.templateRenderer,
    clock,
    bulkBatchSize: options.bulkBatchSize,
    bulkBatchPauseMs: options.bulkBatchPauseMs,
  });

  return { manager, engine, scheduler, preferences, analytics, rateLimiter, historyStore };
}
