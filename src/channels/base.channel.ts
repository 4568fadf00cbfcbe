import { Logger } from 'winston';
import { createLogger } from '../config/logger';
import { ConfigurationError, errorMessage } from '../errors';
import {
  DeliveryErrorCode,
  DeliveryResult,
  Notification,
  NotificationChannel,
  Preference,
} from '../types/notification.types';

/**
 * What the delivery engine needs from a channel.
 */
export interface DeliveryChannel {
  readonly name: NotificationChannel;
  readonly isInitialized: boolean;
  send(notification: Notification, preference: Preference): Promise<DeliveryResult>;
  testConnection(): Promise<boolean>;
}

export interface Channel<TConfig> extends DeliveryChannel {
  initialize(config: TConfig): Promise<void>;
  validateConfig(config: TConfig): boolean;
}

/**
 * Shared send path for every channel: refuse when not initialized, resolve
 * and check the recipient, then hand over to the transport. Transport
 * exceptions become DELIVERY_ERROR results; nothing escapes `send`.
 */
export abstract class BaseChannel<TConfig, TRecipient> implements Channel<TConfig> {
  protected config: TConfig | null = null;
  protected readonly log: Logger;

  constructor(public readonly name: NotificationChannel) {
    this.log = createLogger(`${name}-channel`);
  }

  get isInitialized(): boolean {
    return this.config !== null;
  }

  async initialize(config: TConfig): Promise<void> {
    if (!this.validateConfig(config)) {
      throw new ConfigurationError(this.name, 'invalid configuration');
    }
    await this.setup(config);
    this.config = config;
    this.log.info(`${this.name} channel initialized`);
  }

  async send(notification: Notification, preference: Preference): Promise<DeliveryResult> {
    const config = this.config;
    if (config === null) {
      return this.failure('CONFIGURATION_ERROR', `${this.name} channel not initialized`);
    }

    let recipient: TRecipient;
    try {
      recipient = this.resolveRecipient(notification);
    } catch (error) {
      this.log.warn('Recipient rejected', {
        notificationId: notification.id,
        error: errorMessage(error),
      });
      return this.failure('CONFIGURATION_ERROR', errorMessage(error));
    }

    try {
      return await this.deliver(notification, recipient, config, preference);
    } catch (error) {
      this.log.error(`Failed to send ${this.name} notification`, {
        notificationId: notification.id,
        userId: notification.userId,
        error: errorMessage(error),
      });
      return this.failure('DELIVERY_ERROR', errorMessage(error));
    }
  }

  abstract validateConfig(config: TConfig): boolean;
  abstract testConnection(): Promise<boolean>;

  /** Build transport clients for a validated config */
  protected abstract setup(config: TConfig): Promise<void> | void;

  /** Throws ConfigurationError when the recipient is missing or malformed */
  protected abstract resolveRecipient(notification: Notification): TRecipient;

  protected abstract deliver(
    notification: Notification,
    recipient: TRecipient,
    config: TConfig,
    preference: Preference
  ): Promise<DeliveryResult>;

  protected failure(errorCode: DeliveryErrorCode, message: string): DeliveryResult {
    return { success: false, errorCode, errorMessage: message };
  }

  protected missingRecipient(field: string, reason: string): ConfigurationError {
    return new ConfigurationError(this.name, `${field} ${reason}`);
  }
}

export function readString(metadata: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function readStringArray(metadata: Readonly<Record<string, unknown>>, key: string): string[] {
  const value = metadata[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}
