import type { Logger } from 'winston';
import { Channel } from './channel.js';
import { JobQueue } from './job-queue.js';
import { VisitedSet } from './visited-set.js';
import { CrawlStats } from './stats.js';
import { spawnJob, type CrawlJob, type CrawlParams } from './job.js';
import { CrawlerWorker } from './worker.js';
import { HttpClient } from '../http/client.js';
import { LemmyClient } from '../lemmy/client.js';
import { GeoLocator } from '../geo/locator.js';
import { loadCrawlConfig, type CrawlConfig, type CrawlConfigInput } from '../schemas/config.js';
import { createLogger } from '../utils/logger.js';
import { isValidAddress, normalizeAddress } from '../utils/domain.js';
import { fetchMinimumVersion } from '../utils/version.js';
import { describeError } from '../utils/errors.js';
import type { CrawlReport, CrawlResult, CrawlerDependencies, GeoLookup } from '../types/index.js';

export class Crawler {
  private readonly config: CrawlConfig;
  private readonly deps: CrawlerDependencies;
  private readonly logger: Logger;

  constructor(config: CrawlConfig, deps: CrawlerDependencies = {}) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ name: 'crawler' });
  }

  /**
   * Crawl from the seeds until the frontier is exhausted. Rejects only when the
   * crawl cannot start; per-instance failures end up in the stats.
   */
  async run(): Promise<CrawlReport> {
    const startedAt = new Date();
    const http = new HttpClient({ ...this.config, logger: this.logger });

    try {
      const minimumVersion = await fetchMinimumVersion(this.deps.versions ?? http, this.config.versionUrl);
      this.logger.info(`Minimum accepted version is ${minimumVersion}`);

      const queue = new JobQueue<CrawlJob>();
      const results = new Channel<CrawlResult>();
      queue.onClose(() => results.close());

      const params: CrawlParams = {
        minimumVersion,
        excluded: new Set(this.config.exclude.map(normalizeAddress)),
        maxDistance: this.config.maxDistance,
        software: new Set(this.config.software.map((name) => name.toLowerCase())),
        communities: this.config.communities,
        communityPageLimit: this.config.communityPageLimit,
        visited: new VisitedSet(),
        queue,
        results,
        source: this.deps.source ?? new LemmyClient(http),
        geo: this.deps.geo !== undefined ? this.deps.geo : await this.openGeoLocator(),
        stats: new CrawlStats(),
      };

      this.logger.info(
        `Starting ${this.config.workerCount} workers, max distance ${this.config.maxDistance}`
      );
      const workers = Array.from(
        { length: this.config.workerCount },
        (_, i) => new CrawlerWorker(`worker-${i + 1}`, queue, { logLevel: this.logger.level })
      );
      const running = workers.map((worker) => worker.run());

      this.seed(params);

      const collected: CrawlResult[] = [];
      for await (const result of results) {
        collected.push(result);
      }
      await Promise.all(running);

      let jobsProcessed = 0;
      for (const worker of workers) {
        const workerStats = worker.getStats();
        jobsProcessed += workerStats.jobsProcessed;
        this.logger.debug(
          `${workerStats.workerId} ran ${workerStats.jobsProcessed} jobs in ${workerStats.uptime}ms`
        );
      }

      const stats = params.stats.snapshot();
      this.logger.info(`Crawl finished: ${stats.succeeded} succeeded, ${stats.failed} failed`, {
        visited: params.visited.size,
        jobsProcessed,
      });

      return { results: collected, stats, jobsProcessed, minimumVersion, startedAt, finishedAt: new Date() };
    } finally {
      http.destroy();
    }
  }

  /** Seeding holds its own queue handle so the queue cannot close before every seed is in. */
  private seed(params: CrawlParams): void {
    const handle = params.queue.acquire();
    try {
      for (const seed of this.config.seeds) {
        const domain = normalizeAddress(seed);
        if (!isValidAddress(domain)) {
          this.logger.warn(`Ignoring invalid seed "${seed}"`);
          continue;
        }
        if (params.excluded.has(domain)) {
          this.logger.warn(`Ignoring excluded seed ${domain}`);
          continue;
        }
        spawnJob(params, domain, 0);
      }
    } finally {
      handle.release();
    }
  }

  private async openGeoLocator(): Promise<GeoLookup | null> {
    if (!this.config.geoDatabase) return null;
    try {
      return await GeoLocator.open(this.config.geoDatabase);
    } catch (error) {
      this.logger.warn(`GeoIP database unavailable, continuing without geo data`, {
        path: this.config.geoDatabase,
        error: describeError(error),
      });
      return null;
    }
  }
}

/**
 * Crawl the network from `options.seeds` and collect one result per accepted
 * instance, in no particular order.
 */
export async function runCrawl(
  options: CrawlConfigInput = {},
  deps: CrawlerDependencies = {}
): Promise<CrawlReport> {
  const config = loadCrawlConfig(options, {});
  return new Crawler(config, deps).run();
}
