import * as path from 'path';
import { ChannelRegistry } from './channels/channel-registry';
import { channelConfig, enabledChannels } from './config/channels';
import { env } from './config/env';
import { logger } from './config/logger';
import { createNotificationService, NotificationService } from './index';
import { AnalyticsAggregationJob, FailedRetryJob, ScheduleSweepJob } from './jobs/maintenance.jobs';
import { metricsService } from './services/metrics.service';
import { HandlebarsTemplateRenderer } from './services/template-renderer';

const TEMPLATES_FILE = path.join(__dirname, '..', 'templates', 'notification-templates.json');

let service: NotificationService | null = null;
let jobs: Array<{ stop(): void }> = [];

async function startService(): Promise<void> {
  try {
    const registry = new ChannelRegistry();
    const initialized = await registry.initializeAll(channelConfig, enabledChannels);
    logger.info('Channels initialized', initialized);

    const templateRenderer = new HandlebarsTemplateRenderer();
    await templateRenderer.loadFromFile(TEMPLATES_FILE);

    service = createNotificationService({ registry, templateRenderer, metrics: metricsService });
    service.manager.initialize();

    for (const [channel, healthy] of Object.entries(await registry.testConnections())) {
      if (!healthy) {
        logger.warn('Channel connection check failed', { channel });
      }
    }

    const aggregation = new AnalyticsAggregationJob(service.analytics);
    const sweep = new ScheduleSweepJob(service.scheduler);
    const failedRetry = new FailedRetryJob(service.manager);
    jobs = [aggregation, sweep, failedRetry];
    aggregation.start();
    sweep.start();
    failedRetry.start();

    logger.info(`${env.SERVICE_NAME} is running`);
    logger.info(`Environment: ${env.NODE_ENV}`);
    logger.info(`Workers: ${env.WORKER_COUNT}`);
  } catch (error) {
    logger.error('Failed to start service', { error });
    process.exit(1);
  }
}

async function gracefulShutdown(): Promise<void> {
  logger.info('Graceful shutdown initiated...');

  try {
    for (const job of jobs) {
      job.stop();
    }
    if (service) {
      await service.manager.shutdown();
    }
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void gracefulShutdown();
});
process.on('SIGINT', () => {
  void gracefulShutdown();
});

void startService();
