import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { MAX_SMS_LENGTH, SmsChannel, SmsTransport, formatSmsBody } from '../../../src/channels/sms.channel';
import { SmsChannelConfig } from '../../../src/config/channels';
import { buildNotification, buildPreference } from '../../helpers/fixtures';

const config: SmsChannelConfig = {
  accountSid: 'AC-test',
  authToken: 'test-secret',
  fromNumber: '+15550100100',
};

describe('SmsChannel', () => {
  describe('formatSmsBody', () => {
    it('should prefix a type tag and the title', () => {
      const notification = buildNotification({ type: 'trading_alert', title: 'Filled', body: 'AAPL 10 @ 190' });
      expect(formatSmsBody(notification)).toBe('[TRADE] Filled: AAPL 10 @ 190');
    });

    it('should use a generic tag and skip an empty title', () => {
      expect(formatSmsBody(buildNotification({ title: '', body: 'Check your account' }))).toBe('[ALERT] Check your account');
    });

    it('should truncate long messages with an ellipsis', () => {
      const body = formatSmsBody(buildNotification({ type: 'risk_warning', title: '', body: 'x'.repeat(2000) }));

      expect(body).toHaveLength(MAX_SMS_LENGTH);
      expect(body.startsWith('[RISK] xxx')).toBe(true);
      expect(body.endsWith('x...')).toBe(true);
    });
  });

  describe('send', () => {
    let transport: { sendMessage: jest.Mock<SmsTransport['sendMessage']>; verify: jest.Mock<SmsTransport['verify']> };
    let channel: SmsChannel;
    const preference = buildPreference();

    beforeEach(async () => {
      transport = {
        sendMessage: jest.fn<SmsTransport['sendMessage']>().mockResolvedValue({ sid: 'SM1', status: 'queued' }),
        verify: jest.fn<SmsTransport['verify']>().mockResolvedValue(true),
      };
      channel = new SmsChannel(() => transport);
      await channel.initialize(config);
    });

    it('should normalize the phone number and send the formatted body', async () => {
      const notification = buildNotification({ type: 'price_alert', title: 'BTC', body: 'crossed 50k' });

      const result = await channel.send(notification, preference);

      expect(transport.sendMessage).toHaveBeenCalledWith({
        to: '+15550100199',
        body: '[PRICE] BTC: crossed 50k',
        from: '+15550100100',
        messagingServiceSid: undefined,
      });
      expect(result).toMatchObject({ success: true, messageId: 'SM1', metadata: { providerStatus: 'queued' } });
    });

    it('should reject phone numbers with too few digits', async () => {
      const result = await channel.send(buildNotification({ metadata: { phone: '12345' } }), preference);

      expect(result.errorCode).toBe('CONFIGURATION_ERROR');
      expect(result.errorMessage).toBe('sms channel misconfigured: phone "12345" must have 10 to 15 digits');
    });

    it('should treat an undelivered status as a delivery error', async () => {
      transport.sendMessage.mockResolvedValue({ sid: 'SM2', status: 'undelivered' });

      const result = await channel.send(buildNotification(), preference);

      expect(result.errorCode).toBe('DELIVERY_ERROR');
      expect(result.errorMessage).toBe('Failed to send sms notification: message SM2 undelivered');
    });

    it('should check the account through the transport', async () => {
      expect(await channel.testConnection()).toBe(true);
      transport.verify.mockRejectedValue(new Error('401'));
      expect(await channel.testConnection()).toBe(false);
    });
  });

  describe('validateConfig', () => {
    it('should need a sender number or a messaging service', () => {
      const channel = new SmsChannel();
      expect(channel.validateConfig({ accountSid: 'AC-test', authToken: 'test-secret' })).toBe(false);
      expect(channel.validateConfig({ accountSid: 'AC-test', authToken: 'test-secret', messagingServiceSid: 'MG1' })).toBe(true);
    });
  });
});
