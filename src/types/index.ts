// Crawler types
export type {
  ActivityWindow,
  SiteSchemaVersion,
  FederatedPeers,
  SiteCountsSummary,
  SiteSummary,
  CommunitySummary,
  GeoInfo,
  CrawlResult,
  InstanceDetails,
  InstanceSource,
  GeoLookup,
  FailureKind,
  RejectionReason,
  CrawlStatsSnapshot,
  CrawlReport,
  CrawlerDependencies,
  CrawlerWorkerOptions,
  WorkerStats,
} from './crawler.js';

// HTTP types
export type {
  TransportOptions,
  HttpClientOptions,
  HttpResponse,
} from './http.js';
