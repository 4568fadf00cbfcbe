import { v4 as uuidv4 } from 'uuid';
import { ChannelRegistry } from '../channels/channel-registry';
import { env } from '../config/env';
import { createLogger } from '../config/logger';
import {
  QueueFullError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
  errorMessage,
} from '../errors';
import { MetricsService, metricsService } from './metrics.service';
import { RateLimiter, RateLimitResult } from './rate-limiter';
import { isExpired } from '../schemas/validation';
import {
  Clock,
  DeliveryRecord,
  DeliveryResult,
  Notification,
  NotificationChannel,
  Preference,
  systemClock,
} from '../types/notification.types';
import { AsyncQueue } from '../utils/async-queue';
import { DelayQueue } from '../utils/delay-queue';
import { calculateBackoffMs, lastAttemptAt, shouldRetry } from '../utils/retry';
import { withTimeout } from '../utils/timeout';

const log = createLogger('delivery-engine');

export interface DeliveryEngineOptions {
  registry: ChannelRegistry;
  rateLimiter?: RateLimiter;
  metrics?: MetricsService;
  clock?: Clock;
  workerCount?: number;
  queueCapacity?: number;
  retryQueueCapacity?: number;
  /** How long a worker waits on an empty queue before re-checking for shutdown */
  pollIntervalMs?: number;
  channelTimeoutMs?: number;
}

export type RecordListener = (record: DeliveryRecord, notification: Notification) => void;

export interface EngineStats {
  state: EngineState;
  workers: number;
  queued: number;
  queueCapacity: number;
  retryQueued: number;
  retryQueueCapacity: number;
  inFlight: number;
  processed: number;
  delivered: number;
  failed: number;
  retried: number;
  rateLimited: number;
  rejected: number;
}

export type EngineState = 'idle' | 'running' | 'stopped';

interface Submission {
  notification: Notification;
  channels: NotificationChannel[];
  preference: Preference;
  resolve: (records: DeliveryRecord[]) => void;
  reject: (error: Error) => void;
}

interface RetryItem {
  notification: Notification;
  preference: Preference;
  record: DeliveryRecord;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Worker pool over a bounded submission queue plus one retry consumer over a
 * bounded delay queue.
 *
 * Record lifecycle per (notification, channel):
 *   pending -> delivered | failed
 *   failed -> retrying -> delivered | failed   (while the policy allows)
 * A failed record is final once it has no nextRetryAt. Rate-limited records
 * stay pending with metadata.rateLimited set and are never retried.
 */
export class DeliveryEngine {
  private readonly registry: ChannelRegistry;
  private readonly rateLimiter: RateLimiter;
  private readonly metrics: MetricsService;
  private readonly clock: Clock;
  private readonly workerCount: number;
  private readonly pollIntervalMs: number;
  private readonly channelTimeoutMs: number;
  private readonly queue: AsyncQueue<Submission>;
  private readonly retryQueue: DelayQueue<RetryItem>;

  private state: EngineState = 'idle';
  private loops: Promise<void>[] = [];
  private readonly retryTasks = new Set<Promise<void>>();
  private readonly listeners = new Set<RecordListener>();
  private idleWaiters: Array<() => void> = [];

  // Submissions accepted but not finished, and retries queued or running
  private pendingSubmissions = 0;
  private outstandingRetries = 0;

  private counters = {
    processed: 0,
    delivered: 0,
    failed: 0,
    retried: 0,
    rateLimited: 0,
    rejected: 0,
  };

  constructor(options: DeliveryEngineOptions) {
    this.registry = options.registry;
    this.clock = options.clock ?? systemClock;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(undefined, this.clock);
    this.metrics = options.metrics ?? metricsService;
    this.workerCount = options.workerCount ?? env.WORKER_COUNT;
    this.pollIntervalMs = options.pollIntervalMs ?? env.QUEUE_POLL_INTERVAL_MS;
    this.channelTimeoutMs = options.channelTimeoutMs ?? env.CHANNEL_TIMEOUT_MS;
    this.queue = new AsyncQueue(options.queueCapacity ?? env.QUEUE_CAPACITY);
    this.retryQueue = new DelayQueue(options.retryQueueCapacity ?? env.RETRY_QUEUE_CAPACITY, this.clock);
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  start(): void {
    if (this.state === 'running') {
      return;
    }
    if (this.state === 'stopped') {
      throw new ServiceUnavailableError('delivery-engine', 'Delivery engine cannot restart after stop');
    }

    this.state = 'running';
    for (let i = 0; i < this.workerCount; i++) {
      this.loops.push(this.workerLoop(i));
    }
    this.loops.push(this.retryLoop());
    log.info('Delivery engine started', { workers: this.workerCount });
  }

  /**
   * Stop intake, reject submissions still queued, finalize queued retries as
   * failed and wait for in-flight attempts to finish.
   */
  async stop(): Promise<void> {
    if (this.state !== 'running') {
      this.state = 'stopped';
      return;
    }
    this.state = 'stopped';
    log.info('Stopping delivery engine');

    this.queue.close();
    for (const submission of this.queue.drain()) {
      this.pendingSubmissions--;
      submission.reject(new ServiceUnavailableError('delivery-engine', 'Engine stopped before dispatch'));
    }

    this.retryQueue.close();
    for (const item of this.retryQueue.drain()) {
      this.outstandingRetries--;
      this.finalizeFailed(item, 'Engine stopped before retry');
    }

    await Promise.all(this.loops);
    await Promise.all([...this.retryTasks]);
    this.loops = [];
    this.updateGauges();
    this.checkIdle();
    log.info('Delivery engine stopped', { ...this.counters });
  }

  /**
   * Queue a notification for dispatch on the given channels. Throws at once
   * when the engine is not running or the queue is full; otherwise resolves
   * with one record per channel after the first attempt.
   */
  submit(notification: Notification, channels: NotificationChannel[], preference: Preference): Promise<DeliveryRecord[]> {
    if (this.state !== 'running') {
      throw new ServiceUnavailableError('delivery-engine', 'Delivery engine is not running');
    }

    const { promise, resolve, reject } = deferred<DeliveryRecord[]>();
    const accepted = this.queue.offer({
      notification,
      channels: [...new Set(channels)],
      preference,
      resolve,
      reject,
    });
    if (!accepted) {
      this.counters.rejected++;
      this.metrics.recordRejected('queue_full');
      throw new QueueFullError('delivery', this.queue.capacity);
    }

    this.pendingSubmissions++;
    this.metrics.recordSubmitted(notification.type);
    this.updateGauges();
    return promise;
  }

  onRecordUpdate(listener: RecordListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once nothing is queued, retrying or in flight */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  getStats(): EngineStats {
    return {
      state: this.state,
      workers: this.workerCount,
      queued: this.queue.size,
      queueCapacity: this.queue.capacity,
      retryQueued: this.retryQueue.size,
      retryQueueCapacity: this.retryQueue.capacity,
      inFlight: this.pendingSubmissions - this.queue.size + (this.outstandingRetries - this.retryQueue.size),
      ...this.counters,
    };
  }

  private async workerLoop(workerId: number): Promise<void> {
    log.debug('Worker started', { workerId });
    while (this.state === 'running') {
      const submission = await this.queue.take(this.pollIntervalMs);
      if (!submission) {
        continue;
      }

      try {
        submission.resolve(await this.process(submission));
      } catch (error) {
        submission.reject(error instanceof Error ? error : new Error(String(error)));
      } finally {
        this.pendingSubmissions--;
        this.counters.processed++;
        this.updateGauges();
        this.checkIdle();
      }
    }
    log.debug('Worker stopped', { workerId });
  }

  private async process(submission: Submission): Promise<DeliveryRecord[]> {
    const { notification, channels, preference } = submission;
    const now = this.clock();

    if (isExpired(notification, now)) {
      this.counters.rejected++;
      this.metrics.recordRejected('expired');
      log.warn('Discarding expired notification', { notificationId: notification.id });
      throw new ValidationError(`Notification ${notification.id} expired before dispatch`, {
        notificationId: notification.id,
      });
    }

    const records = channels.map((channel) => this.createRecord(notification, channel, now));

    const limit = this.rateLimiter.checkLimits(notification, now);
    if (!limit.allowed) {
      for (const record of records) {
        this.markRateLimited(notification, record, limit);
      }
      return records;
    }

    // Channels are independent: one channel's failure never blocks another
    const results = await Promise.allSettled(
      records.map((record) => this.dispatch(notification, preference, record))
    );
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        log.error('Channel dispatch crashed', {
          notificationId: notification.id,
          channel: records[i].channel,
          error: errorMessage(result.reason),
        });
      }
    });

    return records;
  }

  private async dispatch(notification: Notification, preference: Preference, record: DeliveryRecord): Promise<void> {
    const limit = this.rateLimiter.checkChannel(record.channel, this.clock());
    if (!limit.allowed) {
      this.markRateLimited(notification, record, limit);
      return;
    }
    await this.attemptDelivery(notification, preference, record);
  }

  /**
   * One attempt for one record: timestamp it, send under the channel
   * timeout, then settle the record and queue a retry when allowed.
   */
  private async attemptDelivery(
    notification: Notification,
    preference: Preference,
    record: DeliveryRecord
  ): Promise<void> {
    const startedAt = this.clock();
    record.attempts.push(startedAt);
    record.sentAt = startedAt;
    record.updatedAt = startedAt;

    const result = await this.send(notification, preference, record.channel);
    const finishedAt = this.clock();
    record.updatedAt = finishedAt;

    if (result.success) {
      record.status = 'delivered';
      record.deliveredAt = finishedAt;
      record.errorMessage = undefined;
      record.nextRetryAt = undefined;
      if (result.messageId) {
        record.metadata.messageId = result.messageId;
      }
      this.counters.delivered++;
      this.metrics.recordAttempt(record.channel, 'delivered');
      this.notify(record, notification);
      return;
    }

    record.status = 'failed';
    record.failedAt = finishedAt;
    record.errorMessage = result.errorMessage ?? 'Unknown delivery error';
    record.metadata.errorCode = result.errorCode ?? 'DELIVERY_ERROR';

    const retrying = result.errorCode !== 'CONFIGURATION_ERROR' && this.queueRetry(notification, preference, record, finishedAt);
    if (!retrying) {
      record.nextRetryAt = undefined;
      this.counters.failed++;
    }
    this.metrics.recordAttempt(record.channel, retrying ? 'retrying' : 'failed');

    log.warn('Delivery attempt failed', {
      notificationId: notification.id,
      channel: record.channel,
      attempt: record.attempts.length,
      errorCode: record.metadata.errorCode,
      error: record.errorMessage,
      nextRetryAt: record.nextRetryAt?.toISOString(),
    });
    this.notify(record, notification);
  }

  private async send(
    notification: Notification,
    preference: Preference,
    channelName: NotificationChannel
  ): Promise<DeliveryResult> {
    const channel = this.registry.get(channelName);
    if (!channel) {
      return {
        success: false,
        errorCode: 'CONFIGURATION_ERROR',
        errorMessage: `No ${channelName} channel registered`,
      };
    }

    const endTimer = this.metrics.startSendTimer(channelName);
    try {
      return await withTimeout(
        channel.send(notification, preference),
        this.channelTimeoutMs,
        `${channelName} send`
      );
    } catch (error) {
      return {
        success: false,
        errorCode: error instanceof TimeoutError ? 'TIMEOUT' : 'DELIVERY_ERROR',
        errorMessage: errorMessage(error),
      };
    } finally {
      endTimer();
    }
  }

  private queueRetry(
    notification: Notification,
    preference: Preference,
    record: DeliveryRecord,
    now: Date
  ): boolean {
    const policy = notification.retryPolicy;
    if (!policy || record.retryCount >= policy.maxRetries) {
      return false;
    }
    if (this.state !== 'running') {
      record.errorMessage = `${record.errorMessage ?? 'Delivery failed'} (engine stopped before retry)`;
      return false;
    }

    const dueAt = new Date(now.getTime() + calculateBackoffMs(policy, record.retryCount));
    if (!this.retryQueue.offer({ notification, preference, record }, dueAt)) {
      log.warn('Retry queue full, failing record', {
        notificationId: notification.id,
        channel: record.channel,
      });
      return false;
    }

    record.nextRetryAt = dueAt;
    this.outstandingRetries++;
    this.updateGauges();
    return true;
  }

  private async retryLoop(): Promise<void> {
    while (this.state === 'running') {
      const item = await this.retryQueue.take(this.pollIntervalMs);
      if (!item) {
        continue;
      }
      // Retries run side by side so one slow channel does not hold up the rest
      const task: Promise<void> = this.runRetry(item).finally(() => {
        this.retryTasks.delete(task);
      });
      this.retryTasks.add(task);
    }
  }

  private async runRetry(item: RetryItem): Promise<void> {
    const { notification, preference, record } = item;
    let requeued = false;

    try {
      const now = this.clock();
      if (!shouldRetry(notification.retryPolicy, record, now)) {
        requeued = this.requeue(item);
        if (!requeued) {
          this.finalizeFailed(item, record.errorMessage ?? 'Retry no longer allowed');
        }
        return;
      }

      record.status = 'retrying';
      record.retryCount++;
      record.nextRetryAt = undefined;
      record.updatedAt = now;
      this.counters.retried++;
      this.notify(record, notification);

      await this.attemptDelivery(notification, preference, record);
    } catch (error) {
      log.error('Retry crashed', {
        notificationId: notification.id,
        channel: record.channel,
        error: errorMessage(error),
      });
      this.finalizeFailed(item, errorMessage(error));
    } finally {
      if (!requeued) {
        this.outstandingRetries--;
        this.updateGauges();
        this.checkIdle();
      }
    }
  }

  /** Put back an item taken before its backoff elapsed on this engine's clock */
  private requeue(item: RetryItem): boolean {
    const policy = item.notification.retryPolicy;
    const last = lastAttemptAt(item.record);
    if (!policy || !last || item.record.retryCount >= policy.maxRetries || this.state !== 'running') {
      return false;
    }
    const dueAt = new Date(last.getTime() + calculateBackoffMs(policy, item.record.retryCount));
    if (!this.retryQueue.offer(item, dueAt)) {
      return false;
    }
    item.record.nextRetryAt = dueAt;
    return true;
  }

  private finalizeFailed(item: RetryItem, reason: string): void {
    const { record, notification } = item;
    record.status = 'failed';
    record.nextRetryAt = undefined;
    record.errorMessage = reason;
    record.failedAt = this.clock();
    record.updatedAt = record.failedAt;
    this.counters.failed++;
    this.notify(record, notification);
  }

  private createRecord(notification: Notification, channel: NotificationChannel, now: Date): DeliveryRecord {
    return {
      id: uuidv4(),
      notificationId: notification.id,
      userId: notification.userId,
      channel,
      status: 'pending',
      retryCount: 0,
      attempts: [],
      metadata: {},
      createdAt: now,
      updatedAt: now,
    };
  }

  private markRateLimited(notification: Notification, record: DeliveryRecord, limit: RateLimitResult): void {
    record.metadata.rateLimited = true;
    record.metadata.rateLimitKey = limit.key;
    if (limit.retryAfter !== undefined) {
      record.metadata.retryAfterSeconds = limit.retryAfter;
    }
    record.updatedAt = this.clock();
    this.counters.rateLimited++;
    this.metrics.recordRateLimited(limit.key.split(':')[0]);
    log.warn('Delivery dropped by rate limit', {
      notificationId: notification.id,
      channel: record.channel,
      key: limit.key,
    });
    this.notify(record, notification);
  }

  private notify(record: DeliveryRecord, notification: Notification): void {
    for (const listener of this.listeners) {
      try {
        listener(record, notification);
      } catch (error) {
        log.error('Record listener threw', { error: errorMessage(error) });
      }
    }
  }

  private isIdle(): boolean {
    return this.pendingSubmissions === 0 && this.outstandingRetries === 0;
  }

  private checkIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private updateGauges(): void {
    this.metrics.setQueueDepth('delivery', this.queue.size);
    this.metrics.setQueueDepth('retry', this.retryQueue.size);
    this.metrics.setInFlight(this.getStats().inFlight);
  }
}
