import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { BaseChannel, readStringArray } from './base.channel';
import { PushChannelConfig } from '../config/channels';
import { DeliveryError } from '../errors';
import { DeliveryResult, Notification } from '../types/notification.types';
import { HttpResponse, HttpTransport, axiosTransport, describeHttpError } from '../utils/http';

const PushGatewayResponseSchema = Type.Object({
  results: Type.Array(
    Type.Object({
      token: Type.String(),
      success: Type.Boolean(),
      messageId: Type.Optional(Type.String()),
      error: Type.Optional(Type.String()),
    })
  ),
});

export type PushGatewayResponse = Static<typeof PushGatewayResponseSchema>;

export class PushChannel extends BaseChannel<PushChannelConfig, string[]> {
  constructor(private readonly http: HttpTransport = axiosTransport) {
    super('push');
  }

  validateConfig(config: PushChannelConfig): boolean {
    return (
      typeof config.gatewayUrl === 'string' &&
      /^https?:\/\//.test(config.gatewayUrl) &&
      Boolean(config.apiKey) &&
      config.timeoutMs > 0
    );
  }

  async testConnection(): Promise<boolean> {
    const config = this.config;
    if (!config?.gatewayUrl) {
      return false;
    }
    try {
      const response = await this.http.get(`${config.gatewayUrl}/health`, {
        headers: this.headers(config),
        timeout: config.timeoutMs,
      });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      this.log.warn('Push gateway health check failed', { error: describeHttpError(error) });
      return false;
    }
  }

  protected setup(): void {
    // Stateless: every request carries the gateway URL and key
  }

  protected resolveRecipient(notification: Notification): string[] {
    const tokens = readStringArray(notification.metadata, 'deviceTokens');
    if (tokens.length === 0) {
      throw this.missingRecipient('deviceTokens', 'must contain at least one token');
    }
    return tokens;
  }

  protected async deliver(
    notification: Notification,
    tokens: string[],
    config: PushChannelConfig
  ): Promise<DeliveryResult> {
    let response: HttpResponse;
    try {
      response = await this.http.post(
        `${config.gatewayUrl}/send`,
        {
          tokens,
          notification: { title: notification.title, body: notification.body },
          data: {
            notificationId: notification.id,
            type: notification.type,
            priority: notification.priority,
          },
        },
        { headers: this.headers(config), timeout: config.timeoutMs }
      );
    } catch (error) {
      throw new DeliveryError('push', describeHttpError(error));
    }

    const data = response.data;
    if (!Value.Check(PushGatewayResponseSchema, data)) {
      throw new DeliveryError('push', 'unexpected gateway response');
    }

    const accepted = data.results.filter((r) => r.success);
    const rejected = data.results.filter((r) => !r.success);

    if (accepted.length === 0) {
      throw new DeliveryError('push', rejected[0]?.error ?? 'no device token accepted', {
        rejected: rejected.length,
      });
    }

    this.log.info('Push notification sent', {
      notificationId: notification.id,
      accepted: accepted.length,
      rejected: rejected.length,
    });

    return {
      success: true,
      messageId: accepted[0].messageId ?? `push-${notification.id}`,
      deliveredAt: new Date(),
      metadata: {
        accepted: accepted.length,
        rejected: rejected.length,
        invalidTokens: rejected.map((r) => r.token),
      },
    };
  }

  private headers(config: PushChannelConfig): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${config.apiKey ?? ''}`,
    };
  }
}
