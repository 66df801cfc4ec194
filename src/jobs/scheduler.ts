import cron, { type ScheduledTask } from 'node-cron';
import type { RateExportService } from '../services/rateExportService.js';
import type { ExchangeRateService } from '../services/exchangeRateService.js';
import { logger } from '../utils/logger.js';
import type { NotificationScheduler } from './notificationScheduler.js';
import { runRateExport } from './rateExportJob.js';

export const JOB_NAMES = ['rate-notifications', 'rate-export'] as const;

export type JobName = typeof JOB_NAMES[number];

export interface JobSchedulerDeps {
  notifications: NotificationScheduler;
  rates: ExchangeRateService;
  exporter: RateExportService;
  exportCurrencies: readonly string[];
  exportCron?: string;
  timezone: string;
}

/**
 * Owns the background jobs: the per-minute notification loop and the
 * optional cron-driven rate export.
 */
export class JobScheduler {
  private exportJob: ScheduledTask | null = null;
  private isShuttingDown = false;

  constructor(private readonly deps: JobSchedulerDeps) {}

  start(): void {
    if (this.deps.notifications.isRunning()) {
      logger.warn('Scheduler already initialized, skipping...');
      return;
    }

    logger.info('Initializing job scheduler...');

    // Notification loop - checks subscriptions every minute
    this.deps.notifications.start();

    // Rate Export - only when a cron expression is configured
    const expression = this.deps.exportCron;
    if (expression) {
      if (!cron.validate(expression)) {
        logger.error(`[Scheduler] Invalid EXPORT_CRON expression "${expression}", rate export disabled`);
      } else {
        this.exportJob = cron.schedule(expression, async () => {
          logger.info('[Scheduler] Running rate export job...');
          try {
            await runRateExport(this.deps.rates, this.deps.exporter, this.deps.exportCurrencies);
          } catch (error) {
            logger.error('[Scheduler] Rate export failed:', error);
          }
        }, {
          timezone: this.deps.timezone,
        });
      }
    }

    logger.info(`Scheduler initialized with ${this.getStatus().jobs.length} jobs`);
  }

  /**
   * Stop all jobs. Resolves after the notification loop has saved subscriptions.
   */
  async stop(): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Scheduler is already shutting down...');
      return;
    }

    this.isShuttingDown = true;
    logger.info('Stopping job scheduler...');

    try {
      if (this.exportJob) {
        this.exportJob.stop();
        this.exportJob = null;
      }
      await this.deps.notifications.stop();
    } finally {
      this.isShuttingDown = false;
    }

    logger.info('Scheduler stopped');
  }

  /**
   * Run a specific job manually
   */
  async runJob(jobName: string): Promise<{ success: boolean; result?: unknown; error?: string }> {
    switch (jobName) {
      case 'rate-notifications': {
        const result = await this.deps.notifications.runTick();
        return { success: true, result };
      }
      case 'rate-export': {
        const result = await runRateExport(this.deps.rates, this.deps.exporter, this.deps.exportCurrencies);
        return { success: true, result };
      }
      default:
        return { success: false, error: `Unknown job: ${jobName}` };
    }
  }

  getStatus(): {
    isRunning: boolean;
    jobs: JobName[];
    notifications: ReturnType<NotificationScheduler['getStatus']>;
  } {
    const jobs: JobName[] = [];
    if (this.deps.notifications.isRunning()) {
      jobs.push('rate-notifications');
    }
    if (this.exportJob) {
      jobs.push('rate-export');
    }

    return {
      isRunning: jobs.length > 0,
      jobs,
      notifications: this.deps.notifications.getStatus(),
    };
  }
}
