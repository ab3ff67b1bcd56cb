// Config schemas
export {
  DEFAULT_VERSION_URL,
  HttpConfigSchema,
  CrawlConfigSchema,
  loadCrawlConfig,
  type HttpConfig,
  type CrawlConfig,
  type CrawlConfigInput,
} from './config.js';

// Site schemas
export {
  OffsetTimestampSchema,
  NaiveTimestampSchema,
  RegistrationModeSchema,
  SiteCountsSchema,
  LocalSiteSchema,
  SiteV019Schema,
  SiteV018Schema,
  GetSiteResponseV019Schema,
  GetSiteResponseV018Schema,
  LegacyFederatedInstancesSchema,
  GetSiteResponseLegacySchema,
  type RegistrationMode,
  type SiteCounts,
  type GetSiteResponseV019,
  type GetSiteResponseV018,
  type GetSiteResponseLegacy,
  type LegacyFederatedInstances,
} from './site.js';

// Federation schemas
export {
  InstanceV019Schema,
  InstanceV018Schema,
  FederatedInstancesV019Schema,
  FederatedInstancesV018Schema,
  GetFederatedInstancesResponseV019Schema,
  GetFederatedInstancesResponseV018Schema,
  type InstanceV019,
  type InstanceV018,
  type FederatedInstancesV019,
  type FederatedInstancesV018,
} from './federation.js';

// NodeInfo schemas
export {
  NODEINFO_REL_PREFIX,
  NodeInfoWellKnownSchema,
  NodeInfoSchema,
  type NodeInfoWellKnown,
  type NodeInfo,
} from './nodeinfo.js';

// Community schemas
export {
  CommunityViewSchema,
  ListCommunitiesResponseSchema,
  type CommunityView,
  type ListCommunitiesResponse,
} from './community.js';
