import type { Server } from 'node:http';
import { ZodError } from 'zod';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config/env.js';
import { NotificationScheduler } from './jobs/notificationScheduler.js';
import { JobScheduler } from './jobs/scheduler.js';
import { PageFetcher } from './scraper/pageFetcher.js';
import { AdminService } from './services/adminService.js';
import { ExchangeRateService } from './services/exchangeRateService.js';
import { RateExportService } from './services/rateExportService.js';
import { TelegramDeliveryService } from './services/telegramDeliveryService.js';
import { SubscriptionStore } from './stores/subscriptionStore.js';
import { logger } from './utils/logger.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error('Invalid configuration:', error.issues);
    } else {
      logger.error('Failed to load configuration:', error);
    }
    process.exit(1);
  }
}

/**
 * Register handlers for graceful shutdown on SIGTERM and SIGINT
 */
function registerGracefulShutdown(jobs: JobScheduler, server: Server): void {
  let shuttingDown = false;

  const shutdownHandler = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal} signal. Initiating graceful shutdown...`);

    try {
      // Saves subscriptions before resolving
      await jobs.stop();
      await new Promise<void>(resolve => server.close(() => resolve()));
      logger.info('Graceful shutdown complete. Exiting...');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  // Handle SIGTERM (sent by container orchestrators like Docker/Kubernetes)
  process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));

  // Handle SIGINT (Ctrl+C in terminal)
  process.on('SIGINT', () => void shutdownHandler('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection:', reason);
  });

  logger.info('Graceful shutdown handlers registered');
}

function main(): void {
  const config = readConfig();
  logger.setLevel(config.logLevel);

  const store = new SubscriptionStore(config.subscriptionsFile);
  store.load();

  const fetcher = new PageFetcher({
    baseUrl: config.rates.baseUrl,
    maxRetries: config.rates.maxRetries,
    retryDelayMs: config.rates.retryDelayMs,
    requestTimeoutMs: config.rates.requestTimeoutMs,
  });
  const rates = new ExchangeRateService(fetcher, config.rates.city);
  const exporter = new RateExportService(config.exports.dir, config.scheduler.timezone);

  const delivery = new TelegramDeliveryService(config.telegram);
  if (!delivery.isConfigured()) {
    logger.warn('TELEGRAM_BOT_TOKEN is not set; notifications will be logged as failed deliveries');
  }

  const notifications = new NotificationScheduler(store, rates, delivery, {
    intervalMs: config.scheduler.intervalMs,
    timezone: config.scheduler.timezone,
  });

  const jobs = new JobScheduler({
    notifications,
    rates,
    exporter,
    exportCurrencies: config.rates.defaultCurrencies,
    exportCron: config.exports.cron,
    timezone: config.scheduler.timezone,
  });

  const app = createApp({
    rates,
    exporter,
    store,
    adminService: new AdminService(store, delivery),
    jobs,
    supportedCurrencies: config.rates.defaultCurrencies,
    adminToken: config.adminToken,
    corsOrigin: config.corsOrigin,
    environment: config.env,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server listening on port ${config.port}`);
  });

  registerGracefulShutdown(jobs, server);
  jobs.start();
}

main();
