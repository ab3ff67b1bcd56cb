import type { Logger } from 'winston';
import type { JobQueue } from './job-queue.js';
import type { CrawlJob } from './job.js';
import { createWorkerLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { CrawlerWorkerOptions, WorkerStats } from '../types/index.js';

export class CrawlerWorker {
  private readonly workerId: string;
  private readonly queue: JobQueue<CrawlJob>;
  private readonly logger: Logger;
  private jobsProcessed: number;
  private isRunning: boolean;
  private startTime: number | null;
  private endTime: number | null;

  constructor(workerId: string, queue: JobQueue<CrawlJob>, options: CrawlerWorkerOptions = {}) {
    this.workerId = workerId;
    this.queue = queue;
    this.logger = options.logger ?? createWorkerLogger(workerId, options.logLevel);
    this.jobsProcessed = 0;
    this.isRunning = false;
    this.startTime = null;
    this.endTime = null;
  }

  /** Pull and run jobs until the queue closes. */
  async run(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    this.startTime = Date.now();
    this.logger.debug('Worker started');

    try {
      for (let job = await this.queue.pull(); job; job = await this.queue.pull()) {
        try {
          await job.run(this.logger);
        } catch (error) {
          this.logger.error('Job escaped its error handling', {
            domain: job.domain,
            error: describeError(error),
          });
        }
        this.jobsProcessed += 1;
      }
    } finally {
      this.isRunning = false;
      this.endTime = Date.now();
    }

    this.logger.debug(`Worker finished after ${this.jobsProcessed} jobs`);
  }

  getStats(): WorkerStats {
    const until = this.endTime ?? Date.now();
    return {
      workerId: this.workerId,
      isRunning: this.isRunning,
      jobsProcessed: this.jobsProcessed,
      uptime: this.startTime ? until - this.startTime : 0,
    };
  }
}
