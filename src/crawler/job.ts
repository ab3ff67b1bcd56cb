import type { Logger } from 'winston';
import type { Channel } from './channel.js';
import type { JobQueue, QueueHandle } from './job-queue.js';
import type { VisitedSet } from './visited-set.js';
import type { CrawlStats } from './stats.js';
import type { SiteView } from '../lemmy/site-view.js';
import type { NodeInfo } from '../schemas/nodeinfo.js';
import { hostnameOf, isValidAddress } from '../utils/domain.js';
import { acceptsVersion } from '../utils/version.js';
import { IdentityError, PolicyError, describeError, isCrawlError } from '../utils/errors.js';
import type {
  CommunitySummary,
  CrawlResult,
  GeoInfo,
  GeoLookup,
  InstanceSource,
  RejectionReason,
} from '../types/index.js';

/** Shared by every job of one crawl; built once by the orchestrator. */
export interface CrawlParams {
  readonly minimumVersion: string;
  readonly excluded: ReadonlySet<string>;
  readonly maxDistance: number;
  readonly software: ReadonlySet<string>;
  readonly communities: boolean;
  readonly communityPageLimit: number;
  readonly visited: VisitedSet;
  readonly queue: JobQueue<CrawlJob>;
  readonly results: Channel<CrawlResult>;
  readonly source: InstanceSource;
  readonly geo: GeoLookup | null;
  readonly stats: CrawlStats;
}

/** Queue a job for `domain`, taking its queue handle before the caller lets go of its own. */
export function spawnJob(params: CrawlParams, domain: string, distance: number): CrawlJob {
  const job = new CrawlJob(domain, distance, params, params.queue.acquire());
  params.queue.push(job);
  return job;
}

export class CrawlJob {
  readonly domain: string;
  readonly distance: number;
  private readonly params: CrawlParams;
  private readonly handle: QueueHandle;

  constructor(domain: string, distance: number, params: CrawlParams, handle: QueueHandle) {
    this.domain = domain;
    this.distance = distance;
    this.params = params;
    this.handle = handle;
  }

  /**
   * Run to completion. Never throws: failures are counted and logged, and the
   * queue handle is released on every path.
   */
  async run(logger: Logger): Promise<void> {
    const meta = { domain: this.domain, distance: this.distance };
    try {
      const rejection = this.reject();
      if (rejection) {
        this.params.stats.recordRejection(rejection);
        logger.debug(`Skipped (${rejection})`, meta);
        return;
      }

      logger.debug('Crawling', meta);
      const result = await this.crawl(logger);
      this.params.results.send(result);
      this.params.stats.recordSuccess();
      logger.debug(`Accepted ${result.software.name} ${result.software.version}`, meta);
    } catch (error) {
      if (isCrawlError(error)) {
        this.params.stats.recordFailure(error.kind);
        logger.debug(`Failed (${error.kind})`, { ...meta, error: error.message });
      } else {
        this.params.stats.recordFailure('unexpected');
        logger.warn('Failed unexpectedly', { ...meta, error: describeError(error) });
      }
    } finally {
      this.handle.release();
    }
  }

  /** Pre-fetch checks. The visited claim goes last so rejected addresses never enter the set. */
  private reject(): RejectionReason | null {
    if (!isValidAddress(this.domain)) return 'invalid';
    if (this.params.excluded.has(this.domain)) return 'excluded';
    if (this.distance > this.params.maxDistance) return 'distance';
    if (!this.params.visited.claim(this.domain)) return 'duplicate';
    return null;
  }

  private async crawl(logger: Logger): Promise<CrawlResult> {
    const { nodeInfo, site } = await this.params.source.fetchInstance(this.domain);
    this.verify(nodeInfo, site);

    const federation = site.federatedPeers();
    const queued = this.expand(federation.linked);
    if (queued > 0) {
      logger.debug(`Queued ${queued} peers`, { domain: this.domain, distance: this.distance });
    }

    const [communities, geo] = await Promise.all([
      this.fetchCommunities(logger),
      this.locate(logger),
    ]);

    const result: CrawlResult = {
      domain: this.domain,
      distance: this.distance,
      software: { name: nodeInfo.software.name, version: site.version() },
      schema: site.schema,
      site: site.summary(),
      counts: site.counts(),
      openRegistrations: nodeInfo.openRegistrations,
      federation,
    };
    if (communities) result.communities = communities;
    if (geo) result.geo = geo;
    return result;
  }

  private verify(nodeInfo: NodeInfo, site: SiteView): void {
    const software = nodeInfo.software.name.toLowerCase();
    if (!this.params.software.has(software)) {
      throw new PolicyError(this.domain, `Unrecognized software "${nodeInfo.software.name}"`);
    }

    const actorHost = hostnameOf(site.actorIdentity());
    if (actorHost !== this.domain) {
      throw new IdentityError(
        this.domain,
        `Site identifies as ${site.actorIdentity()}, expected host ${this.domain}`
      );
    }

    const version = site.version();
    if (!acceptsVersion(version, this.params.minimumVersion)) {
      throw new PolicyError(
        this.domain,
        `Version ${version} is below minimum ${this.params.minimumVersion}`
      );
    }
  }

  private expand(peers: string[]): number {
    const { excluded, maxDistance, visited } = this.params;
    if (this.distance >= maxDistance) return 0;

    let queued = 0;
    for (const peer of peers) {
      if (!isValidAddress(peer) || excluded.has(peer) || visited.has(peer)) continue;
      spawnJob(this.params, peer, this.distance + 1);
      queued += 1;
    }
    return queued;
  }

  private async fetchCommunities(logger: Logger): Promise<CommunitySummary[] | null> {
    if (!this.params.communities) return null;
    try {
      return await this.params.source.fetchCommunities(this.domain, this.params.communityPageLimit);
    } catch (error) {
      logger.debug('Community listing unavailable', { domain: this.domain, error: describeError(error) });
      return null;
    }
  }

  private async locate(logger: Logger): Promise<GeoInfo | null> {
    if (!this.params.geo) return null;
    try {
      return await this.params.geo.locate(this.domain);
    } catch (error) {
      logger.debug('Geo lookup failed', { domain: this.domain, error: describeError(error) });
      return null;
    }
  }
}
