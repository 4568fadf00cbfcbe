import { describe, it, expect } from '@jest/globals';
import { ChannelFactories, ChannelRegistry } from '../../../src/channels/channel-registry';
import { EmailChannel, EmailTransport } from '../../../src/channels/email.channel';
import { PushChannel } from '../../../src/channels/push.channel';
import { SmsChannel, SmsTransport } from '../../../src/channels/sms.channel';
import { WebhookChannel } from '../../../src/channels/webhook.channel';
import { ChannelConfigMap } from '../../../src/config/channels';
import { HttpTransport } from '../../../src/utils/http';

const emailTransport: EmailTransport = {
  setApiKey: () => undefined,
  send: async () => ({ statusCode: 202 }),
};

const smsTransport: SmsTransport = {
  sendMessage: async () => ({ sid: 'SM1', status: 'queued' }),
  verify: async () => true,
};

const http: HttpTransport = {
  post: async () => ({ status: 200, data: {} }),
  get: async () => ({ status: 200, data: {} }),
};

const factories: ChannelFactories = {
  email: () => new EmailChannel(emailTransport),
  sms: () => new SmsChannel(() => smsTransport),
  push: () => new PushChannel(http),
  webhook: () => new WebhookChannel(http),
};

const configs: ChannelConfigMap = {
  email: { apiKey: 'test-key', fromEmail: 'alerts@example.com', fromName: 'Alerts' },
  // No credentials
  sms: {},
  push: { gatewayUrl: 'https://push.example.com', apiKey: 'test-key', timeoutMs: 1000 },
  webhook: { timeoutMs: 1000 },
};

describe('ChannelRegistry', () => {
  it('should register enabled channels and keep failed ones uninitialized', async () => {
    const registry = new ChannelRegistry(factories);

    const outcome = await registry.initializeAll(configs, { email: true, sms: true, push: false, webhook: true });

    expect(outcome).toEqual({ email: true, sms: false, push: false, webhook: true });
    expect(registry.list()).toEqual(['email', 'sms', 'webhook']);
    expect(registry.get('sms')?.isInitialized).toBe(false);
    expect(registry.get('push')).toBeUndefined();
  });

  it('should report a connection check per registered channel', async () => {
    const registry = new ChannelRegistry(factories);
    await registry.initializeAll(configs, { email: true, sms: true, push: true, webhook: false });

    expect(await registry.testConnections()).toEqual({ email: true, sms: false, push: true });
  });
});
