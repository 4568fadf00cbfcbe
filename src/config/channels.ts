import { env } from './env';
import { NotificationChannel } from '../types/notification.types';

export interface EmailChannelConfig {
  apiKey?: string;
  fromEmail: string;
  fromName: string;
}

export interface SmsChannelConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  messagingServiceSid?: string;
}

export interface PushChannelConfig {
  gatewayUrl?: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface WebhookChannelConfig {
  secret?: string;
  timeoutMs: number;
}

export interface ChannelConfigMap {
  email: EmailChannelConfig;
  sms: SmsChannelConfig;
  push: PushChannelConfig;
  webhook: WebhookChannelConfig;
}

export const channelConfig: ChannelConfigMap = {
  email: {
    apiKey: env.SENDGRID_API_KEY,
    fromEmail: env.SENDGRID_FROM_EMAIL,
    fromName: env.SENDGRID_FROM_NAME,
  },
  sms: {
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    fromNumber: env.TWILIO_FROM_NUMBER,
    messagingServiceSid: env.TWILIO_MESSAGING_SERVICE_SID,
  },
  push: {
    gatewayUrl: env.PUSH_GATEWAY_URL,
    apiKey: env.PUSH_API_KEY,
    timeoutMs: env.CHANNEL_TIMEOUT_MS,
  },
  webhook: {
    secret: env.WEBHOOK_SECRET,
    timeoutMs: env.CHANNEL_TIMEOUT_MS,
  },
};

export const enabledChannels: Record<NotificationChannel, boolean> = {
  email: env.ENABLE_EMAIL,
  sms: env.ENABLE_SMS,
  push: env.ENABLE_PUSH,
  webhook: env.ENABLE_WEBHOOK_DELIVERY,
};
