import type { RegistrationMode } from '../schemas/site.js';
import type { NodeInfo } from '../schemas/nodeinfo.js';
import type { SiteView } from '../lemmy/site-view.js';
import type { Logger } from 'winston';
import type { CrawlErrorKind } from '../utils/errors.js';
import type { TextSource } from '../utils/version.js';

export type ActivityWindow = 'day' | 'week' | 'month' | 'halfyear';

export type SiteSchemaVersion = 'v0.19' | 'v0.18' | 'legacy';

export interface FederatedPeers {
  linked: string[];
  allowed: string[];
  blocked: string[];
}

export interface SiteCountsSummary {
  users: number;
  posts: number;
  comments: number;
  communities: number;
  usersActiveDay: number;
  usersActiveWeek: number;
  usersActiveMonth: number;
  usersActiveHalfYear: number;
}

export interface SiteSummary {
  name: string;
  description: string | null;
  icon: string | null;
  banner: string | null;
  actorId: string;
  contentWarning: string | null;
  registrationMode: RegistrationMode | null;
  captchaEnabled: boolean;
}

export interface CommunitySummary {
  actorId: string;
  name: string;
  title: string;
  nsfw: boolean;
  subscribers: number;
  subscribersLocal: number;
  posts: number;
  comments: number;
  usersActiveDay: number;
  usersActiveWeek: number;
  usersActiveMonth: number;
  usersActiveHalfYear: number;
}

export interface GeoInfo {
  ip: string;
  countryCode: string | null;
  countryName: string | null;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface CrawlResult {
  domain: string;
  /** Hops from the nearest seed that discovered this instance. */
  distance: number;
  software: {
    name: string;
    version: string;
  };
  schema: SiteSchemaVersion;
  site: SiteSummary;
  counts: SiteCountsSummary;
  openRegistrations: boolean;
  federation: FederatedPeers;
  communities?: CommunitySummary[];
  geo?: GeoInfo;
}

export interface InstanceDetails {
  nodeInfo: NodeInfo;
  site: SiteView;
}

/** Where a crawl job gets its data from. */
export interface InstanceSource {
  fetchInstance(domain: string): Promise<InstanceDetails>;
  fetchCommunities(domain: string, pageLimit: number): Promise<CommunitySummary[]>;
}

export interface GeoLookup {
  locate(domain: string): Promise<GeoInfo | null>;
}

/** Per-instance failure kinds; `unexpected` covers errors outside the crawl taxonomy. */
export type FailureKind = CrawlErrorKind | 'unexpected';

export type RejectionReason = 'duplicate' | 'invalid' | 'excluded' | 'distance';

export interface CrawlStatsSnapshot {
  succeeded: number;
  failed: number;
  failures: Record<FailureKind, number>;
  rejected: Record<RejectionReason, number>;
}

export interface CrawlReport {
  results: CrawlResult[];
  stats: CrawlStatsSnapshot;
  /** Jobs the workers pulled, rejected ones included. */
  jobsProcessed: number;
  minimumVersion: string;
  startedAt: Date;
  finishedAt: Date;
}

/** Collaborators a caller may swap out; anything omitted is built from the config. */
export interface CrawlerDependencies {
  source?: InstanceSource;
  versions?: TextSource;
  geo?: GeoLookup | null;
  logger?: Logger;
}

export interface CrawlerWorkerOptions {
  logger?: Logger;
  logLevel?: string;
}

export interface WorkerStats {
  workerId: string;
  isRunning: boolean;
  jobsProcessed: number;
  /** Milliseconds from start until the worker finished, or until now while it runs. */
  uptime: number;
}
