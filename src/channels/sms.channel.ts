import twilio from 'twilio';
import { BaseChannel, readString } from './base.channel';
import { SmsChannelConfig } from '../config/channels';
import { DeliveryError } from '../errors';
import { DeliveryResult, Notification, NotificationType } from '../types/notification.types';

// Twilio concatenates segments up to this length
export const MAX_SMS_LENGTH = 1600;

const SMS_TAGS: Partial<Record<NotificationType, string>> = {
  trading_alert: 'TRADE',
  price_alert: 'PRICE',
  risk_warning: 'RISK',
  security_alert: 'SECURITY',
  system_maintenance: 'SYSTEM',
};

const FAILED_STATUSES = new Set(['failed', 'undelivered', 'canceled']);

export interface SmsMessage {
  to: string;
  body: string;
  from?: string;
  messagingServiceSid?: string;
}

export interface SmsTransport {
  sendMessage(message: SmsMessage): Promise<{ sid: string; status: string }>;
  verify(): Promise<boolean>;
}

export type SmsTransportFactory = (config: SmsChannelConfig) => SmsTransport;

export const createTwilioTransport: SmsTransportFactory = (config) => {
  const accountSid = config.accountSid ?? '';
  const client = twilio(accountSid, config.authToken);

  return {
    async sendMessage(message) {
      const created = await client.messages.create({
        to: message.to,
        body: message.body,
        from: message.from,
        messagingServiceSid: message.messagingServiceSid,
      });
      return { sid: created.sid, status: created.status };
    },
    async verify() {
      const account = await client.api.v2010.accounts(accountSid).fetch();
      return account.status === 'active';
    },
  };
};

export function formatSmsBody(notification: Notification): string {
  const tag = SMS_TAGS[notification.type] ?? 'ALERT';
  const text = notification.title
    ? `[${tag}] ${notification.title}: ${notification.body}`
    : `[${tag}] ${notification.body}`;
  return text.length > MAX_SMS_LENGTH ? `${text.slice(0, MAX_SMS_LENGTH - 3)}...` : text;
}

export class SmsChannel extends BaseChannel<SmsChannelConfig, string> {
  private transport: SmsTransport | null = null;

  constructor(private readonly createTransport: SmsTransportFactory = createTwilioTransport) {
    super('sms');
  }

  validateConfig(config: SmsChannelConfig): boolean {
    return (
      Boolean(config.accountSid) &&
      Boolean(config.authToken) &&
      Boolean(config.fromNumber || config.messagingServiceSid)
    );
  }

  async testConnection(): Promise<boolean> {
    if (!this.transport) {
      return false;
    }
    try {
      return await this.transport.verify();
    } catch (error) {
      this.log.warn('Twilio connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  protected setup(config: SmsChannelConfig): void {
    this.transport = this.createTransport(config);
  }

  protected resolveRecipient(notification: Notification): string {
    const phone = readString(notification.metadata, 'phone');
    if (!phone) {
      throw this.missingRecipient('phone', 'is missing from notification metadata');
    }
    const digits = phone.replace(/\D/g, '');
    if (digits.length < 10 || digits.length > 15) {
      throw this.missingRecipient('phone', `"${phone}" must have 10 to 15 digits`);
    }
    return `+${digits}`;
  }

  protected async deliver(
    notification: Notification,
    to: string,
    config: SmsChannelConfig
  ): Promise<DeliveryResult> {
    if (!this.transport) {
      throw new DeliveryError('sms', 'Twilio client not initialized');
    }

    const message = await this.transport.sendMessage({
      to,
      body: formatSmsBody(notification),
      from: config.fromNumber,
      messagingServiceSid: config.messagingServiceSid,
    });

    if (FAILED_STATUSES.has(message.status)) {
      throw new DeliveryError('sms', `message ${message.sid} ${message.status}`);
    }

    this.log.info('SMS sent successfully', {
      notificationId: notification.id,
      sid: message.sid,
      status: message.status,
    });

    return {
      success: true,
      messageId: message.sid,
      deliveredAt: new Date(),
      metadata: { providerStatus: message.status },
    };
  }
}
