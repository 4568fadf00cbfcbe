import { DeliveryChannel } from '../../src/channels/base.channel';
import { ChannelRegistry } from '../../src/channels/channel-registry';
import { getDefaultPreference } from '../../src/services/preference-store';
import {
  Clock,
  DeliveryResult,
  Notification,
  NotificationChannel,
  Preference,
} from '../../src/types/notification.types';

export const T0 = new Date('2026-01-01T10:00:00.000Z');

/** A clock that only moves when told to */
export class ManualClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}

export type ScriptedOutcome = DeliveryResult | Error | (() => Promise<DeliveryResult>);

/**
 * Channel that replays scripted outcomes in order and then repeats the last
 * one. With no script every send succeeds.
 */
export class FakeChannel implements DeliveryChannel {
  readonly sent: Notification[] = [];
  readonly isInitialized = true;
  private readonly script: ScriptedOutcome[];

  constructor(
    readonly name: NotificationChannel,
    script: ScriptedOutcome[] = []
  ) {
    this.script = script;
  }

  get calls(): number {
    return this.sent.length;
  }

  async send(notification: Notification): Promise<DeliveryResult> {
    this.sent.push(notification);
    const outcome = this.script.length === 0
      ? success(`${this.name}-${this.sent.length}`)
      : this.script[Math.min(this.sent.length - 1, this.script.length - 1)];

    if (outcome instanceof Error) {
      throw outcome;
    }
    if (typeof outcome === 'function') {
      return outcome();
    }
    return outcome;
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}

export function success(messageId: string): DeliveryResult {
  return { success: true, messageId };
}

export function failure(message: string = 'provider unavailable'): DeliveryResult {
  return { success: false, errorCode: 'DELIVERY_ERROR', errorMessage: message };
}

export function registryWith(...channels: DeliveryChannel[]): ChannelRegistry {
  const registry = new ChannelRegistry();
  for (const channel of channels) {
    registry.register(channel);
  }
  return registry;
}

let sequence = 0;

export function buildNotification(overrides: Partial<Notification> = {}): Notification {
  sequence++;
  return {
    id: `notif-${sequence}`,
    userId: 'user-1',
    type: 'custom',
    title: 'Order filled',
    body: 'Your order was filled',
    priority: 'normal',
    channels: ['email'],
    metadata: {
      email: 'trader@example.com',
      phone: '+1 555 010 0199',
      webhookUrl: 'https://hooks.example.com/notify',
    },
    createdAt: T0,
    ...overrides,
  };
}

export function buildPreference(overrides: Partial<Preference> = {}): Preference {
  return {
    ...getDefaultPreference('user-1', 'custom'),
    channels: ['email', 'sms', 'push', 'webhook'],
    priorityThreshold: 'low',
    ...overrides,
  };
}

/** Poll until the predicate holds, failing after `timeoutMs` */
export async function waitFor(predicate: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
