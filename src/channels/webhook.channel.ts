import crypto from 'crypto';
import { BaseChannel, readString } from './base.channel';
import { WebhookChannelConfig } from '../config/channels';
import { DeliveryError } from '../errors';
import { DeliveryResult, Notification, Preference } from '../types/notification.types';
import { HttpTransport, axiosTransport, describeHttpError } from '../utils/http';

export const SIGNATURE_HEADER = 'X-Webhook-Signature';
export const TIMESTAMP_HEADER = 'X-Webhook-Timestamp';

export function generateSignature(payload: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

export function verifySignature(payload: string, signature: string, secret: string): boolean {
  const expected = Buffer.from(generateSignature(payload, secret));
  const received = Buffer.from(signature);
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

export class WebhookChannel extends BaseChannel<WebhookChannelConfig, string> {
  constructor(private readonly http: HttpTransport = axiosTransport) {
    super('webhook');
  }

  validateConfig(config: WebhookChannelConfig): boolean {
    return config.timeoutMs > 0;
  }

  async testConnection(): Promise<boolean> {
    // Endpoints are per recipient; there is nothing shared to probe
    return this.isInitialized;
  }

  protected setup(): void {
    // Stateless
  }

  protected resolveRecipient(notification: Notification): string {
    const url = readString(notification.metadata, 'webhookUrl');
    if (!url) {
      throw this.missingRecipient('webhookUrl', 'is missing from notification metadata');
    }
    if (!url.startsWith('http://') && !url.startsWith('https://')) {
      throw this.missingRecipient('webhookUrl', `"${url}" must start with http:// or https://`);
    }
    return url;
  }

  protected async deliver(
    notification: Notification,
    url: string,
    config: WebhookChannelConfig,
    preference: Preference
  ): Promise<DeliveryResult> {
    const timestamp = new Date();
    const payload = JSON.stringify({
      id: notification.id,
      userId: notification.userId,
      type: notification.type,
      title: notification.title,
      body: notification.body,
      priority: notification.priority,
      timezone: preference.timezone,
      metadata: notification.metadata,
      timestamp: timestamp.toISOString(),
    });

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [TIMESTAMP_HEADER]: String(timestamp.getTime()),
    };
    if (config.secret) {
      headers[SIGNATURE_HEADER] = generateSignature(payload, config.secret);
    }

    let status: number;
    try {
      const response = await this.http.post(url, payload, { headers, timeout: config.timeoutMs });
      status = response.status;
    } catch (error) {
      throw new DeliveryError('webhook', describeHttpError(error), { url });
    }

    if (status < 200 || status >= 300) {
      throw new DeliveryError('webhook', `endpoint answered HTTP ${status}`, { url });
    }

    this.log.info('Webhook delivered successfully', {
      notificationId: notification.id,
      url,
      status,
    });

    return {
      success: true,
      messageId: `webhook-${notification.id}-${timestamp.getTime()}`,
      deliveredAt: timestamp,
      metadata: { statusCode: status },
    };
  }
}
