import sgMail from '@sendgrid/mail';
import { BaseChannel, readString } from './base.channel';
import { EmailChannelConfig } from '../config/channels';
import { DeliveryResult, Notification } from '../types/notification.types';

// Loose shape check; the provider does the real validation
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface EmailMessage {
  to: string;
  from: { email: string; name: string };
  subject: string;
  text: string;
  html?: string;
}

export interface EmailTransport {
  setApiKey(apiKey: string): void;
  send(message: EmailMessage): Promise<{ statusCode: number; messageId?: string }>;
}

export const sendGridTransport: EmailTransport = {
  setApiKey(apiKey) {
    sgMail.setApiKey(apiKey);
  },
  async send(message) {
    const [response] = await sgMail.send({
      to: message.to,
      from: message.from,
      subject: message.subject,
      text: message.text,
      html: message.html ?? message.text,
    });
    const messageId: unknown = response.headers['x-message-id'];
    return {
      statusCode: response.statusCode,
      messageId: typeof messageId === 'string' ? messageId : undefined,
    };
  },
};

export class EmailChannel extends BaseChannel<EmailChannelConfig, string> {
  constructor(private readonly transport: EmailTransport = sendGridTransport) {
    super('email');
  }

  validateConfig(config: EmailChannelConfig): boolean {
    return Boolean(config.apiKey) && EMAIL_PATTERN.test(config.fromEmail);
  }

  async testConnection(): Promise<boolean> {
    // SendGrid exposes no cheap ping; a configured key is the best signal
    return this.isInitialized;
  }

  protected setup(config: EmailChannelConfig): void {
    if (config.apiKey) {
      this.transport.setApiKey(config.apiKey);
    }
  }

  protected resolveRecipient(notification: Notification): string {
    const email = readString(notification.metadata, 'email');
    if (!email) {
      throw this.missingRecipient('email', 'is missing from notification metadata');
    }
    if (!email.includes('@') || !EMAIL_PATTERN.test(email)) {
      throw this.missingRecipient('email', `"${email}" is not a valid address`);
    }
    return email;
  }

  protected async deliver(
    notification: Notification,
    to: string,
    config: EmailChannelConfig
  ): Promise<DeliveryResult> {
    const response = await this.transport.send({
      to,
      from: { email: config.fromEmail, name: config.fromName },
      subject: notification.title,
      text: notification.body,
      html: readString(notification.metadata, 'html'),
    });

    this.log.info('Email sent successfully', {
      notificationId: notification.id,
      statusCode: response.statusCode,
      messageId: response.messageId,
    });

    return {
      success: true,
      messageId: response.messageId ?? `email-${notification.id}`,
      deliveredAt: new Date(),
      metadata: { statusCode: response.statusCode },
    };
  }
}
