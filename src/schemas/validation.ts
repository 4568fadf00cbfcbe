/**
 * Validation schemas for notifications, retry policies and preferences.
 *
 * Shapes are checked with TypeBox; cross-field rules (expiry after schedule,
 * quiet hours set together) are checked by hand after the schema passes.
 */

import { Type, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { IANAZone } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../errors';
import {
  Clock,
  NOTIFICATION_CHANNELS,
  NOTIFICATION_PRIORITIES,
  NOTIFICATION_TYPES,
  Notification,
  NotificationChannel,
  NotificationPriority,
  NotificationType,
  Preference,
  RetryPolicy,
  systemClock,
} from '../types/notification.types';

// =============================================================================
// COMMON SCHEMAS
// =============================================================================

export const ChannelSchema = Type.Union(NOTIFICATION_CHANNELS.map((c) => Type.Literal(c)));
export const NotificationTypeSchema = Type.Union(NOTIFICATION_TYPES.map((t) => Type.Literal(t)));
export const PrioritySchema = Type.Union(NOTIFICATION_PRIORITIES.map((p) => Type.Literal(p)));

export const TimeOfDaySchema = Type.String({
  pattern: '^([01]\\d|2[0-3]):[0-5]\\d$',
});

// =============================================================================
// RETRY POLICY
// =============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryDelaySeconds: 60,
  backoffMultiplier: 2.0,
  maxDelaySeconds: 3600,
};

export const RetryPolicySchema = Type.Object(
  {
    maxRetries: Type.Integer({ minimum: 0, maximum: 10 }),
    retryDelaySeconds: Type.Number({ minimum: 1, maximum: 3600 }),
    backoffMultiplier: Type.Number({ minimum: 1, maximum: 10 }),
    // Floor is 1s rather than 60s so short backoff ceilings remain expressible
    maxDelaySeconds: Type.Number({ minimum: 1, maximum: 86400 }),
  },
  { additionalProperties: false }
);

// =============================================================================
// NOTIFICATION
// =============================================================================

export const NotificationSchema = Type.Object({
  id: Type.String({ minLength: 1, maxLength: 128 }),
  userId: Type.String({ minLength: 1, maxLength: 128 }),
  type: NotificationTypeSchema,
  title: Type.String({ maxLength: 500 }),
  body: Type.String({ maxLength: 50000 }),
  priority: PrioritySchema,
  channels: Type.Array(ChannelSchema, { minItems: 1, maxItems: 4, uniqueItems: true }),
  templateId: Type.Optional(Type.String({ minLength: 1, maxLength: 100 })),
  templateData: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  scheduledAt: Type.Optional(Type.Date()),
  expiresAt: Type.Optional(Type.Date()),
  retryPolicy: Type.Optional(RetryPolicySchema),
  metadata: Type.Record(Type.String(), Type.Unknown()),
  createdAt: Type.Date(),
});

// =============================================================================
// PREFERENCE
// =============================================================================

export const PreferenceSchema = Type.Object({
  userId: Type.String({ minLength: 1, maxLength: 128 }),
  type: NotificationTypeSchema,
  channels: Type.Array(ChannelSchema, { minItems: 1, maxItems: 4, uniqueItems: true }),
  enabled: Type.Boolean(),
  quietHoursStart: Type.Optional(TimeOfDaySchema),
  quietHoursEnd: Type.Optional(TimeOfDaySchema),
  timezone: Type.String({ minLength: 1 }),
  frequencyLimit: Type.Optional(Type.Integer({ minimum: 1 })),
  priorityThreshold: PrioritySchema,
  createdAt: Type.Optional(Type.Date()),
  updatedAt: Type.Optional(Type.Date()),
});

// =============================================================================
// HELPERS
// =============================================================================

function assertSchema(schema: TSchema, value: unknown, what: string): void {
  if (Value.Check(schema, value)) {
    return;
  }
  const errors = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path,
    message: e.message,
  }));
  throw new ValidationError(`Invalid ${what}`, { errors });
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  assertSchema(RetryPolicySchema, policy, 'retry policy');
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  validateRetryPolicy(policy);
  return policy;
}

/**
 * Shape and cross-field validation. Expiry is checked against `now` because
 * an already-expired notification is as undeliverable as a malformed one.
 */
export function validateNotification(notification: Notification, now: Date = new Date()): void {
  assertSchema(NotificationSchema, notification, 'notification');

  if (!notification.title.trim() && !notification.body.trim()) {
    throw new ValidationError('Notification must have a title or a body', {
      notificationId: notification.id,
    });
  }

  if (
    notification.scheduledAt &&
    notification.expiresAt &&
    notification.expiresAt.getTime() <= notification.scheduledAt.getTime()
  ) {
    throw new ValidationError('expiresAt must be after scheduledAt', {
      notificationId: notification.id,
    });
  }

  if (isExpired(notification, now)) {
    throw new ValidationError(`Notification ${notification.id} has expired`, {
      notificationId: notification.id,
      expiresAt: notification.expiresAt?.toISOString(),
    });
  }
}

export function isExpired(notification: Notification, now: Date): boolean {
  return notification.expiresAt !== undefined && notification.expiresAt.getTime() <= now.getTime();
}

export interface CreateNotificationInput {
  id?: string;
  userId: string;
  type: NotificationType;
  title: string;
  body: string;
  priority?: NotificationPriority;
  channels: NotificationChannel[];
  templateId?: string;
  templateData?: Record<string, unknown>;
  scheduledAt?: Date;
  expiresAt?: Date;
  retryPolicy?: RetryPolicy;
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}

export function createNotification(input: CreateNotificationInput, clock: Clock = systemClock): Notification {
  const now = clock();
  const notification: Notification = {
    ...input,
    id: input.id ?? uuidv4(),
    priority: input.priority ?? 'normal',
    channels: [...input.channels],
    metadata: { ...input.metadata },
    createdAt: input.createdAt ?? now,
  };
  validateNotification(notification, now);
  return notification;
}

export function validatePreference(preference: Preference): void {
  assertSchema(PreferenceSchema, preference, 'preference');

  const hasStart = preference.quietHoursStart !== undefined;
  const hasEnd = preference.quietHoursEnd !== undefined;
  if (hasStart !== hasEnd) {
    throw new ValidationError('Quiet hours need both a start and an end', {
      userId: preference.userId,
      type: preference.type,
    });
  }

  if (!IANAZone.isValidZone(preference.timezone)) {
    throw new ValidationError(`Invalid timezone: "${preference.timezone}"`, {
      timezone: preference.timezone,
    });
  }
}

export function comparePriority(a: NotificationPriority, b: NotificationPriority): number {
  return NOTIFICATION_PRIORITIES.indexOf(a) - NOTIFICATION_PRIORITIES.indexOf(b);
}
