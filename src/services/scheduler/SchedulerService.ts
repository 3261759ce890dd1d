import cron from 'node-cron';
import { MEMORY_PURGE_CRON } from '../../config/environment';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { MemoryService } from '../memory/MemoryService';
import { MessageIdCache } from '../webhook/MessageIdCache';

export interface ScheduledJob {
  stop(): void;
}

export type CronScheduler = (expression: string, task: () => Promise<void>) => ScheduledJob;

const defaultScheduler: CronScheduler = (expression, task) => cron.schedule(expression, () => {
  task().catch(error => defaultLogger.error('❌ Scheduled job failed:', error));
});

export interface SchedulerOptions {
  purgeCron?: string;
  messageIdCache?: MessageIdCache;
  schedule?: CronScheduler;
  logger?: Logger;
}

export class SchedulerService {
  private jobs: ScheduledJob[] = [];
  private isRunning: boolean = false;
  private readonly purgeCron: string;
  private readonly schedule: CronScheduler;
  private readonly logger: Logger;
  private readonly messageIdCache?: MessageIdCache;

  constructor(private memoryService: MemoryService, options: SchedulerOptions = {}) {
    this.purgeCron = options.purgeCron ?? MEMORY_PURGE_CRON;
    this.schedule = options.schedule ?? defaultScheduler;
    this.logger = options.logger ?? defaultLogger;
    this.messageIdCache = options.messageIdCache;

    if (!cron.validate(this.purgeCron)) {
      throw new Error(`Invalid memory purge schedule: "${this.purgeCron}"`);
    }
  }

  /**
   * Start all scheduled jobs
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('⚠️  Scheduler is already running');
      return;
    }

    this.logger.info('📅 Starting scheduler...');

    this.jobs.push(this.schedule(this.purgeCron, async () => {
      try {
        await this.triggerPurge();
      } catch (error) {
        this.logger.error('❌ Error in scheduled memory purge:', error);
        // Continue running - the next run retries whatever is still expired
      }
    }));
    this.logger.info(`✅ Scheduled expired-memory purge (${this.purgeCron})`);

    if (this.messageIdCache) {
      const cache = this.messageIdCache;
      this.jobs.push(this.schedule('0 * * * *', async () => {
        cache.cleanup();
      }));
      this.logger.info('✅ Scheduled hourly webhook message-id cleanup');
    }

    this.isRunning = true;
  }

  /**
   * Stop all scheduled jobs
   */
  stop(): void {
    if (!this.isRunning) {
      this.logger.warn('⚠️  Scheduler is not running');
      return;
    }

    this.jobs.forEach(job => job.stop());
    this.jobs = [];
    this.isRunning = false;
    this.logger.info('🛑 Scheduler stopped');
  }

  /**
   * Run the expired-memory purge now
   */
  async triggerPurge(): Promise<number> {
    this.logger.info('🧹 Purging expired memories...');
    return this.memoryService.purgeExpired();
  }

  getStatus(): { isRunning: boolean; jobs: number; purgeCron: string } {
    return {
      isRunning: this.isRunning,
      jobs: this.jobs.length,
      purgeCron: this.purgeCron
    };
  }
}
