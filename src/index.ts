export { Crawler, runCrawl } from './crawler/orchestrator.js';
export { CrawlerWorker } from './crawler/worker.js';
export { Channel } from './crawler/channel.js';
export { JobQueue, type QueueHandle } from './crawler/job-queue.js';
export { VisitedSet } from './crawler/visited-set.js';
export { CrawlStats } from './crawler/stats.js';
export { HttpClient } from './http/client.js';
export { LemmyClient, COMMUNITY_PAGE_SIZE } from './lemmy/client.js';
export { SiteView } from './lemmy/site-view.js';
export { GeoLocator, type CityDatabase, type CityRecord, type AddressResolver } from './geo/locator.js';
export {
  fullInstanceData,
  curatedInstanceData,
  minimalInstanceData,
  minimalCommunityData,
  type TotalInstanceStats,
  type TotalCommunityStats,
  type InstanceDetail,
  type MinimalInstanceData,
  type MinimalCommunityData,
} from './output/aggregate.js';
export { writeResults, OUTPUT_FILES } from './output/writer.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export type * from './types/index.js';
