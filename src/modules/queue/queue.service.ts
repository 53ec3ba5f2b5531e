import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import PgBoss from 'pg-boss';

export type JobData = Record<string, unknown>;

export interface QueueJob<T = JobData> {
  id: string;
  name: string;
  data: T;
}

export interface SendJobOptions {
  priority?: number;
  retryLimit?: number;
  retryDelay?: number;
  retryBackoff?: boolean;
  expireInSeconds?: number;
  singletonKey?: string;
  startAfter?: number | string | Date;
}

export interface ScheduleJobOptions {
  tz?: string;
}

export interface JobHandler {
  (job: QueueJob): Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/**
 * Queue Service
 * Persistent job queue on pg-boss; jobs survive restarts and each job is
 * handled by one worker in the cluster
 */
@Injectable()
export class QueueService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(QueueService.name);
  private boss: PgBoss | null = null;
  private handlers: Map<string, JobHandler> = new Map();
  private isStarted = false;
  private readonly queueDisabled: boolean;
  private readonly inlineFallbackEnabled: boolean;

  constructor(private configService: ConfigService) {
    this.queueDisabled =
      process.env.JEST_WORKER_ID !== undefined ||
      this.configService.get<string>('QUEUE_DISABLED', 'false') === 'true';
    this.inlineFallbackEnabled =
      this.configService.get<string>('QUEUE_INLINE_FALLBACK', 'true') === 'true';
  }

  async onModuleInit() {
    if (this.queueDisabled) {
      this.isStarted = true;
      this.logger.warn(
        'QueueService disabled for test/runtime override (jobs run inline)',
      );
      return;
    }
    await this.initialize();
  }

  async onModuleDestroy() {
    await this.shutdown();
  }

  private async initialize(): Promise<void> {
    const dbHost = this.configService.get<string>('DB_HOST', 'localhost');
    const dbPort = this.configService.get<string>('DB_PORT', '5432');
    const dbUsername = this.configService.get<string>('DB_USERNAME', 'postgres');
    const dbPassword = this.configService.get<string>('DB_PASSWORD', '');
    const dbName = this.configService.get<string>('DB_DATABASE', 'invoicing');

    this.logger.log(
      `Initializing pg-boss with database: ${dbName}@${dbHost}:${dbPort}`,
    );

    try {
      const boss = new PgBoss({
        connectionString: `postgresql://${dbUsername}:${dbPassword}@${dbHost}:${dbPort}/${dbName}`,
        schema: 'pgboss',
      });

      // Keep pg-boss errors from crashing the process
      boss.on('error', (error) => {
        this.logger.error(`pg-boss error: ${errorMessage(error)}`, errorStack(error));
      });

      await boss.start();
      this.boss = boss;
      this.isStarted = true;
      this.logger.log('pg-boss started successfully');

      // Handlers registered before start
      for (const [queueName, handler] of this.handlers.entries()) {
        await this.startQueue(boss, queueName, handler);
      }

      this.logger.log(`Registered ${this.handlers.size} job handlers`);
    } catch (error) {
      this.logger.error(`Failed to start pg-boss: ${errorMessage(error)}`, errorStack(error));
      throw error;
    }
  }

  private async shutdown(): Promise<void> {
    if (this.queueDisabled || !this.boss || !this.isStarted) {
      return;
    }

    try {
      this.logger.log('Shutting down pg-boss gracefully...');
      await this.boss.stop({ graceful: true, timeout: 30000 });
      this.isStarted = false;
      this.logger.log('pg-boss stopped successfully');
    } catch (error) {
      this.logger.error(`Error stopping pg-boss: ${errorMessage(error)}`);
    }
  }

  /**
   * Register handler for job type
   * Can be called before or after pg-boss starts
   */
  async registerHandler(queueName: string, handler: JobHandler): Promise<void> {
    this.handlers.set(queueName, handler);
    this.logger.log(`Handler registered for queue: ${queueName}`);

    if (this.queueDisabled) {
      return;
    }

    if (this.boss && this.isStarted) {
      await this.startQueue(this.boss, queueName, handler);
    }
  }

  private async startQueue(
    boss: PgBoss,
    queueName: string,
    handler: JobHandler,
  ): Promise<void> {
    try {
      await boss.createQueue(queueName);

      // The work handler receives a batch
      await boss.work<JobData>(queueName, async (jobs) => {
        for (const job of jobs) {
          this.logger.log(`Processing job ${job.id} from queue ${queueName}`);
          const startTime = Date.now();

          try {
            await handler({ id: job.id, name: job.name, data: job.data });
            this.logger.log(
              `Job ${job.id} completed successfully in ${Date.now() - startTime}ms`,
            );
          } catch (error) {
            this.logger.error(
              `Job ${job.id} failed after ${Date.now() - startTime}ms: ${errorMessage(error)}`,
              errorStack(error),
            );
            throw error; // pg-boss retries
          }
        }
      });

      this.logger.log(`Started processing queue: ${queueName}`);
    } catch (error) {
      this.logger.error(
        `Failed to start queue ${queueName}: ${errorMessage(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }

  /**
   * Send job to queue (persisted to database)
   * Returns job ID for tracking; empty when a singleton job is already queued
   */
  async sendJob(
    queueName: string,
    data: JobData,
    options?: SendJobOptions,
  ): Promise<string> {
    const inlineJobId = `job-inline-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;

    if (this.queueDisabled) {
      this.triggerInlineFallback(queueName, inlineJobId, data, 'queue_disabled');
      return inlineJobId;
    }

    if (!this.boss || !this.isStarted) {
      this.logger.error(`Cannot send job to ${queueName}: pg-boss not started`);
      if (this.inlineFallbackEnabled) {
        this.triggerInlineFallback(queueName, inlineJobId, data, 'queue_not_started');
        return inlineJobId;
      }
      throw new Error('Queue service not available');
    }

    try {
      await this.boss.createQueue(queueName);

      // pg-boss rejects explicit undefined options
      const jobOptions: PgBoss.SendOptions = {};
      if (options?.priority !== undefined) jobOptions.priority = options.priority;
      if (options?.retryLimit !== undefined) jobOptions.retryLimit = options.retryLimit;
      if (options?.retryDelay !== undefined) jobOptions.retryDelay = options.retryDelay;
      if (options?.retryBackoff !== undefined) jobOptions.retryBackoff = options.retryBackoff;
      if (options?.expireInSeconds !== undefined)
        jobOptions.expireInSeconds = options.expireInSeconds;
      if (options?.singletonKey !== undefined) jobOptions.singletonKey = options.singletonKey;
      if (options?.startAfter !== undefined) jobOptions.startAfter = options.startAfter;

      const jobId = await this.boss.send(queueName, data, jobOptions);

      this.logger.log(
        `Job submitted to ${queueName}: ${jobId}${options?.singletonKey ? ` (singleton: ${options.singletonKey})` : ''}`,
      );

      return jobId ?? '';
    } catch (error) {
      this.logger.error(
        `Failed to send job to ${queueName}: ${errorMessage(error)}`,
        errorStack(error),
      );
      if (this.inlineFallbackEnabled) {
        this.triggerInlineFallback(queueName, inlineJobId, data, 'send_failed');
        return inlineJobId;
      }
      throw error;
    }
  }

  /**
   * Schedule (or upsert) a recurring cron job for a queue.
   */
  async scheduleJob(
    queueName: string,
    cronExpression: string,
    data: JobData = {},
    options?: ScheduleJobOptions,
  ): Promise<void> {
    if (this.queueDisabled) {
      this.logger.warn(
        `Schedule skipped for ${queueName}: queue is disabled in this environment`,
      );
      return;
    }

    if (!this.boss || !this.isStarted) {
      throw new Error('Queue service not available');
    }

    await this.boss.createQueue(queueName);
    await this.boss.schedule(queueName, cronExpression, data, { tz: options?.tz });

    this.logger.log(
      `Recurring schedule upserted for ${queueName}: cron="${cronExpression}"${options?.tz ? ` tz=${options.tz}` : ''}`,
    );
  }

  private triggerInlineFallback(
    queueName: string,
    jobId: string,
    data: JobData,
    reason: 'queue_disabled' | 'queue_not_started' | 'send_failed',
  ): void {
    const handler = this.handlers.get(queueName);
    if (!handler) {
      this.logger.warn(
        `Inline fallback skipped for queue ${queueName}: no handler registered (${reason})`,
      );
      return;
    }

    this.logger.warn(
      `Queue fallback active for ${queueName} (${reason}); executing job inline with id=${jobId}`,
    );

    Promise.resolve()
      .then(async () => {
        await handler({ id: jobId, name: queueName, data });
        this.logger.log(`Inline fallback job completed for ${queueName}: ${jobId}`);
      })
      .catch((error: unknown) => {
        this.logger.error(
          `Inline fallback job failed for ${queueName}: ${errorMessage(error)}`,
          errorStack(error),
        );
      });
  }

  isReady(): boolean {
    if (this.queueDisabled) {
      return true;
    }
    return this.isStarted && this.boss !== null;
  }
}
