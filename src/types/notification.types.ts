export const NOTIFICATION_CHANNELS = ['email', 'sms', 'push', 'webhook'] as const;
export type NotificationChannel = typeof NOTIFICATION_CHANNELS[number];

export const NOTIFICATION_TYPES = [
  'trading_alert',
  'price_alert',
  'risk_warning',
  'system_maintenance',
  'account_update',
  'security_alert',
  'market_analysis',
  'portfolio_report',
  'custom',
] as const;
export type NotificationType = typeof NOTIFICATION_TYPES[number];

// Ordered lowest to highest
export const NOTIFICATION_PRIORITIES = ['low', 'normal', 'high', 'urgent', 'critical'] as const;
export type NotificationPriority = typeof NOTIFICATION_PRIORITIES[number];

export type DeliveryStatus = 'pending' | 'delivered' | 'failed' | 'retrying' | 'cancelled';

export interface RetryPolicy {
  maxRetries: number;
  retryDelaySeconds: number;
  backoffMultiplier: number;
  maxDelaySeconds: number;
}

export interface Notification {
  readonly id: string;
  readonly userId: string;
  readonly type: NotificationType;
  readonly title: string;
  readonly body: string;
  readonly priority: NotificationPriority;
  readonly channels: readonly NotificationChannel[];
  readonly templateId?: string;
  readonly templateData?: Readonly<Record<string, unknown>>;
  readonly scheduledAt?: Date;
  readonly expiresAt?: Date;
  readonly retryPolicy?: RetryPolicy;
  /** Recipient details travel here: email, phone, deviceTokens, webhookUrl */
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: Date;
}

export interface DeliveryRecord {
  id: string;
  notificationId: string;
  userId: string;
  channel: NotificationChannel;
  status: DeliveryStatus;
  sentAt?: Date;
  deliveredAt?: Date;
  failedAt?: Date;
  errorMessage?: string;
  retryCount: number;
  /** One timestamp per attempt, the first attempt included */
  attempts: Date[];
  /** Set while a retry is queued for this record */
  nextRetryAt?: Date;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export type DeliveryErrorCode = 'CONFIGURATION_ERROR' | 'DELIVERY_ERROR' | 'TIMEOUT';

export interface DeliveryResult {
  success: boolean;
  messageId?: string;
  errorMessage?: string;
  errorCode?: DeliveryErrorCode;
  deliveredAt?: Date;
  metadata?: Record<string, unknown>;
}

export interface Preference {
  userId: string;
  type: NotificationType;
  channels: NotificationChannel[];
  enabled: boolean;
  /** HH:MM, set together with quietHoursEnd */
  quietHoursStart?: string;
  quietHoursEnd?: string;
  timezone: string;
  /** Maximum sends of this type per hour */
  frequencyLimit?: number;
  priorityThreshold: NotificationPriority;
  createdAt?: Date;
  updatedAt?: Date;
}

export type ChannelStatusCounts = Record<'sent' | 'delivered' | 'failed', number>;

export interface HourlyBucket {
  sent: number;
  delivered: number;
  failed: number;
}

export interface NotificationMetrics {
  totalSent: number;
  totalDelivered: number;
  totalFailed: number;
  deliveryRate: number;
  averageDeliveryTimeMs: number;
  channelMetrics: Partial<Record<NotificationChannel, ChannelStatusCounts>>;
  typeMetrics: Partial<Record<NotificationType, ChannelStatusCounts>>;
  periodStart: Date;
  periodEnd: Date;
  hourly: Record<string, HourlyBucket>;
}

export interface RealTimeStats {
  totalSent: number;
  totalDelivered: number;
  totalFailed: number;
  totalRateLimited: number;
  deliveryRate: number;
  channelStats: Partial<Record<NotificationChannel, ChannelStatusCounts>>;
  typeStats: Partial<Record<NotificationType, ChannelStatusCounts>>;
  lastAggregatedAt: Date;
}

export interface ChannelStatusEntry {
  channel: NotificationChannel;
  status: DeliveryStatus;
  retryCount: number;
  sentAt?: Date;
  deliveredAt?: Date;
  failedAt?: Date;
  errorMessage?: string;
  rateLimited: boolean;
}

export interface NotificationStatus {
  notificationId: string;
  totalChannels: number;
  delivered: number;
  failed: number;
  pending: number;
  cancelled: number;
  perChannel: ChannelStatusEntry[];
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
