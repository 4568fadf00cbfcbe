import { Channel, DeliveryChannel } from './base.channel';
import { EmailChannel } from './email.channel';
import { PushChannel } from './push.channel';
import { SmsChannel } from './sms.channel';
import { WebhookChannel } from './webhook.channel';
import { ChannelConfigMap } from '../config/channels';
import { createLogger } from '../config/logger';
import { errorMessage } from '../errors';
import { NOTIFICATION_CHANNELS, NotificationChannel } from '../types/notification.types';

const log = createLogger('channel-registry');

export type ChannelFactories = {
  [K in NotificationChannel]: () => Channel<ChannelConfigMap[K]>;
};

export const DEFAULT_CHANNEL_FACTORIES: ChannelFactories = {
  email: () => new EmailChannel(),
  sms: () => new SmsChannel(),
  push: () => new PushChannel(),
  webhook: () => new WebhookChannel(),
};

/**
 * One channel implementation per channel tag, chosen when the registry is
 * built. Dispatch looks channels up by tag and never branches on the variant.
 */
export class ChannelRegistry {
  private readonly channels = new Map<NotificationChannel, DeliveryChannel>();

  constructor(private readonly factories: ChannelFactories = DEFAULT_CHANNEL_FACTORIES) {}

  register(channel: DeliveryChannel): void {
    this.channels.set(channel.name, channel);
  }

  get(name: NotificationChannel): DeliveryChannel | undefined {
    return this.channels.get(name);
  }

  list(): NotificationChannel[] {
    return [...this.channels.keys()];
  }

  /**
   * Build and initialize every enabled channel. A channel whose
   * initialization fails stays registered but uninitialized, so sends to it
   * fail with a configuration error instead of vanishing.
   */
  async initializeAll(
    configs: ChannelConfigMap,
    enabled: Record<NotificationChannel, boolean>
  ): Promise<Record<NotificationChannel, boolean>> {
    const outcome: Record<NotificationChannel, boolean> = {
      email: false,
      sms: false,
      push: false,
      webhook: false,
    };

    for (const name of NOTIFICATION_CHANNELS) {
      if (!enabled[name]) {
        log.info('Channel disabled', { channel: name });
        continue;
      }
      outcome[name] = await this.initializeChannel(name, configs);
    }

    return outcome;
  }

  async testConnections(): Promise<Partial<Record<NotificationChannel, boolean>>> {
    const results: Partial<Record<NotificationChannel, boolean>> = {};
    for (const [name, channel] of this.channels) {
      results[name] = await channel.testConnection();
    }
    return results;
  }

  private async initializeChannel<K extends NotificationChannel>(
    name: K,
    configs: ChannelConfigMap
  ): Promise<boolean> {
    const channel = this.factories[name]();
    this.register(channel);
    try {
      await channel.initialize(configs[name]);
      return true;
    } catch (error) {
      log.warn('Channel initialization failed', { channel: name, error: errorMessage(error) });
      return false;
    }
  }
}
