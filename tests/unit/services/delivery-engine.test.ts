import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { DeliveryChannel } from '../../../src/channels/base.channel';
import { RateLimitConfig } from '../../../src/config/rate-limits';
import { QueueFullError, ServiceUnavailableError, ValidationError } from '../../../src/errors';
import { DeliveryEngine, DeliveryEngineOptions } from '../../../src/services/delivery-engine';
import { MetricsService } from '../../../src/services/metrics.service';
import { RateLimiter } from '../../../src/services/rate-limiter';
import { DeliveryRecord, DeliveryResult, RetryPolicy } from '../../../src/types/notification.types';
import {
  FakeChannel,
  ManualClock,
  T0,
  buildNotification,
  buildPreference,
  failure,
  registryWith,
  success,
  waitFor,
} from '../../helpers/fixtures';

const UNLIMITED: RateLimitConfig = {
  user: { max: 1000, duration: 3600 },
  types: {},
  channels: {},
};

const FAST_RETRY: RetryPolicy = {
  maxRetries: 2,
  retryDelaySeconds: 1,
  backoffMultiplier: 2,
  maxDelaySeconds: 10,
};

function byChannel(records: DeliveryRecord[], channel: string): DeliveryRecord {
  const record = records.find((r) => r.channel === channel);
  if (!record) {
    throw new Error(`no ${channel} record`);
  }
  return record;
}

describe('DeliveryEngine', () => {
  let clock: ManualClock;
  let metrics: MetricsService;
  let engine: DeliveryEngine;
  const preference = buildPreference();

  function createEngine(
    channels: DeliveryChannel[],
    options: Partial<DeliveryEngineOptions> & { limits?: RateLimitConfig } = {}
  ): DeliveryEngine {
    const { limits, ...rest } = options;
    engine = new DeliveryEngine({
      registry: registryWith(...channels),
      rateLimiter: new RateLimiter(limits ?? UNLIMITED, clock.now),
      metrics,
      clock: clock.now,
      workerCount: 2,
      pollIntervalMs: 5,
      channelTimeoutMs: 1000,
      ...rest,
    });
    engine.start();
    return engine;
  }

  beforeEach(() => {
    clock = new ManualClock();
    metrics = new MetricsService();
  });

  afterEach(async () => {
    await engine.stop();
  });

  it('should fail once and never retry without a retry policy', async () => {
    const email = new FakeChannel('email', [failure()]);
    createEngine([email]);

    const records = await engine.submit(buildNotification(), ['email'], preference);

    expect(records).toHaveLength(1);
    expect(records[0].status).toBe('failed');
    expect(records[0].retryCount).toBe(0);
    expect(records[0].attempts).toEqual([T0]);
    expect(records[0].errorMessage).toBe('provider unavailable');
    expect(records[0].metadata.errorCode).toBe('DELIVERY_ERROR');
    expect(records[0].nextRetryAt).toBeUndefined();

    await engine.onIdle();
    expect(email.calls).toBe(1);
    expect(engine.getStats().failed).toBe(1);
  });

  it('should deliver one channel and retry the other with exponential backoff', async () => {
    const email = new FakeChannel('email');
    const sms = new FakeChannel('sms', [failure('carrier rejected')]);
    createEngine([email, sms]);

    const records = await engine.submit(
      buildNotification({ channels: ['email', 'sms'], retryPolicy: FAST_RETRY }),
      ['email', 'sms'],
      preference
    );
    const emailRecord = byChannel(records, 'email');
    const smsRecord = byChannel(records, 'sms');

    expect(emailRecord.status).toBe('delivered');
    expect(emailRecord.attempts).toHaveLength(1);
    expect(emailRecord.metadata.messageId).toBe('email-1');
    expect(smsRecord.status).toBe('failed');
    expect(smsRecord.nextRetryAt).toEqual(new Date(T0.getTime() + 1000));

    clock.advance(1000);
    await waitFor(() => smsRecord.attempts.length === 2 && smsRecord.nextRetryAt !== undefined);
    expect(smsRecord.nextRetryAt).toEqual(new Date(T0.getTime() + 3000));

    clock.advance(2000);
    await engine.onIdle();

    expect(smsRecord.status).toBe('failed');
    expect(smsRecord.retryCount).toBe(2);
    expect(smsRecord.nextRetryAt).toBeUndefined();
    expect(smsRecord.attempts).toEqual([T0, new Date(T0.getTime() + 1000), new Date(T0.getTime() + 3000)]);
    expect(sms.calls).toBe(3);
    expect(email.calls).toBe(1);
    expect(engine.getStats()).toMatchObject({ delivered: 1, failed: 1, retried: 2 });
  });

  it('should not retry before the backoff elapses', async () => {
    const sms = new FakeChannel('sms', [failure()]);
    createEngine([sms]);

    await engine.submit(buildNotification({ channels: ['sms'], retryPolicy: FAST_RETRY }), ['sms'], preference);
    clock.advance(999);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(sms.calls).toBe(1);
    expect(engine.getStats().retryQueued).toBe(1);
  });

  it('should mark a record delivered when a retry succeeds', async () => {
    const sms = new FakeChannel('sms', [failure(), success('SM123')]);
    createEngine([sms]);

    const [record] = await engine.submit(
      buildNotification({ channels: ['sms'], retryPolicy: FAST_RETRY }),
      ['sms'],
      preference
    );
    clock.advance(1000);
    await engine.onIdle();

    expect(record.status).toBe('delivered');
    expect(record.retryCount).toBe(1);
    expect(record.deliveredAt).toEqual(new Date(T0.getTime() + 1000));
    expect(record.errorMessage).toBeUndefined();
    expect(record.metadata.messageId).toBe('SM123');
  });

  it('should not retry configuration errors', async () => {
    const misconfigured: DeliveryResult = {
      success: false,
      errorCode: 'CONFIGURATION_ERROR',
      errorMessage: 'email is missing from notification metadata',
    };
    const email = new FakeChannel('email', [misconfigured]);
    createEngine([email]);

    const [record] = await engine.submit(buildNotification({ retryPolicy: FAST_RETRY }), ['email'], preference);

    expect(record.status).toBe('failed');
    expect(record.metadata.errorCode).toBe('CONFIGURATION_ERROR');
    expect(record.nextRetryAt).toBeUndefined();
    expect(engine.getStats().retryQueued).toBe(0);
  });

  it('should fail channels with no registered implementation', async () => {
    createEngine([new FakeChannel('email')]);

    const [record] = await engine.submit(buildNotification({ channels: ['push'] }), ['push'], preference);

    expect(record.status).toBe('failed');
    expect(record.errorMessage).toBe('No push channel registered');
    expect(record.metadata.errorCode).toBe('CONFIGURATION_ERROR');
  });

  it('should time out a channel that never answers', async () => {
    const email = new FakeChannel('email', [() => new Promise<DeliveryResult>(() => undefined)]);
    createEngine([email], { channelTimeoutMs: 20 });

    const [record] = await engine.submit(buildNotification(), ['email'], preference);

    expect(record.status).toBe('failed');
    expect(record.metadata.errorCode).toBe('TIMEOUT');
    expect(record.errorMessage).toBe('email send timed out after 20ms');
  });

  it('should turn a thrown channel error into a failed record', async () => {
    createEngine([new FakeChannel('email', [new Error('socket hang up')])]);

    const [record] = await engine.submit(buildNotification(), ['email'], preference);

    expect(record.status).toBe('failed');
    expect(record.errorMessage).toBe('socket hang up');
    expect(record.metadata.errorCode).toBe('DELIVERY_ERROR');
  });

  it('should leave channel rate limited records pending without sending', async () => {
    const sms = new FakeChannel('sms');
    createEngine([sms], { limits: { ...UNLIMITED, channels: { sms: { max: 1, duration: 60 } } } });

    await engine.submit(buildNotification({ channels: ['sms'] }), ['sms'], preference);
    const [limited] = await engine.submit(buildNotification({ channels: ['sms'] }), ['sms'], preference);

    expect(sms.calls).toBe(1);
    expect(limited.status).toBe('pending');
    expect(limited.attempts).toEqual([]);
    expect(limited.metadata).toEqual({ rateLimited: true, rateLimitKey: 'channel:sms', retryAfterSeconds: 60 });
    expect(engine.getStats().rateLimited).toBe(1);
    expect(await metrics.getMetricValue('notification_rate_limited_total', { scope: 'channel' })).toBe(1);
  });

  it('should drop every channel when the user limit is reached', async () => {
    const email = new FakeChannel('email');
    const sms = new FakeChannel('sms');
    createEngine([email, sms], { limits: { ...UNLIMITED, user: { max: 1, duration: 3600 } } });

    await engine.submit(buildNotification({ channels: ['email'] }), ['email'], preference);
    const records = await engine.submit(buildNotification({ channels: ['email', 'sms'] }), ['email', 'sms'], preference);

    expect(records.map((r) => r.metadata.rateLimitKey)).toEqual(['user:user-1', 'user:user-1']);
    expect(email.calls).toBe(1);
    expect(sms.calls).toBe(0);
  });

  it('should reject a notification that expired while queued', async () => {
    createEngine([new FakeChannel('email')]);
    const notification = buildNotification({ id: 'late', expiresAt: new Date(T0.getTime() + 1000) });
    clock.advance(1000);

    await expect(engine.submit(notification, ['email'], preference)).rejects.toThrow(
      new ValidationError('Notification late expired before dispatch')
    );
    expect(engine.getStats().rejected).toBe(1);
  });

  it('should refuse submissions when the queue is full', async () => {
    let release: (result: DeliveryResult) => void = () => undefined;
    const blocked = new Promise<DeliveryResult>((resolve) => {
      release = resolve;
    });
    const email = new FakeChannel('email', [() => blocked]);
    createEngine([email], { workerCount: 1, queueCapacity: 1 });

    const first = engine.submit(buildNotification(), ['email'], preference);
    const second = engine.submit(buildNotification(), ['email'], preference);

    expect(() => engine.submit(buildNotification(), ['email'], preference)).toThrow(QueueFullError);
    expect(engine.getStats().rejected).toBe(1);

    release(success('ok'));
    expect((await first)[0].status).toBe('delivered');
    expect((await second)[0].status).toBe('delivered');
  });

  it('should deduplicate channels within one submission', async () => {
    const email = new FakeChannel('email');
    createEngine([email]);

    const records = await engine.submit(buildNotification(), ['email', 'email'], preference);

    expect(records).toHaveLength(1);
    expect(email.calls).toBe(1);
  });

  it('should report record updates to listeners until unsubscribed', async () => {
    createEngine([new FakeChannel('email')]);
    const seen: string[] = [];
    const unsubscribe = engine.onRecordUpdate((record) => seen.push(`${record.channel}:${record.status}`));

    await engine.submit(buildNotification(), ['email'], preference);
    unsubscribe();
    await engine.submit(buildNotification(), ['email'], preference);

    expect(seen).toEqual(['email:delivered']);
  });

  it('should count attempts in metrics', async () => {
    createEngine([new FakeChannel('email'), new FakeChannel('sms', [failure()])]);

    await engine.submit(buildNotification({ channels: ['email', 'sms'] }), ['email', 'sms'], preference);

    expect(await metrics.getMetricValue('notification_delivery_attempts_total', { channel: 'email', outcome: 'delivered' })).toBe(1);
    expect(await metrics.getMetricValue('notification_delivery_attempts_total', { channel: 'sms', outcome: 'failed' })).toBe(1);
    expect(await metrics.getMetricValue('notifications_submitted_total', { type: 'custom' })).toBe(1);
  });

  describe('lifecycle', () => {
    it('should refuse submissions before start', () => {
      engine = new DeliveryEngine({ registry: registryWith(), metrics, clock: clock.now });

      expect(() => engine.submit(buildNotification(), ['email'], preference)).toThrow(
        new ServiceUnavailableError('delivery-engine', 'Delivery engine is not running')
      );
    });

    it('should finalize queued retries on stop and refuse to restart', async () => {
      const sms = new FakeChannel('sms', [failure('carrier rejected')]);
      createEngine([sms]);

      const [record] = await engine.submit(
        buildNotification({ channels: ['sms'], retryPolicy: FAST_RETRY }),
        ['sms'],
        preference
      );
      expect(record.nextRetryAt).toBeDefined();

      await engine.stop();

      expect(record.status).toBe('failed');
      expect(record.errorMessage).toBe('Engine stopped before retry');
      expect(record.nextRetryAt).toBeUndefined();
      expect(engine.getStats().state).toBe('stopped');
      expect(() => engine.start()).toThrow(ServiceUnavailableError);
    });

    it('should reject submissions still queued at stop', async () => {
      let release: (result: DeliveryResult) => void = () => undefined;
      const blocked = new Promise<DeliveryResult>((resolve) => {
        release = resolve;
      });
      createEngine([new FakeChannel('email', [() => blocked])], { workerCount: 1 });

      const inFlight = engine.submit(buildNotification(), ['email'], preference);
      const queued = engine.submit(buildNotification(), ['email'], preference);

      const stopping = engine.stop();
      await expect(queued).rejects.toThrow('Engine stopped before dispatch');

      release(success('ok'));
      await stopping;
      expect((await inFlight)[0].status).toBe('delivered');
    });
  });
});
