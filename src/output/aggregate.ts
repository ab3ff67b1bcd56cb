import type { CommunitySummary, CrawlResult } from '../types/index.js';

interface ActivityTotals {
  usersActiveDay: number;
  usersActiveWeek: number;
  usersActiveMonth: number;
  usersActiveHalfYear: number;
}

export interface TotalInstanceStats<T> extends ActivityTotals {
  crawledInstances: number;
  totalUsers: number;
  posts: number;
  comments: number;
  startTime: string;
  endTime: string;
  instanceDetails: T[];
}

export interface TotalCommunityStats<T> extends ActivityTotals {
  crawledCommunities: number;
  subscribers: number;
  subscribersLocal: number;
  posts: number;
  comments: number;
  startTime: string;
  endTime: string;
  communityDetails: T[];
}

export type InstanceDetail = Omit<CrawlResult, 'communities'>;

export interface MinimalInstanceData extends ActivityTotals {
  domain: string;
  users: number;
  posts: number;
  comments: number;
  communities: number;
}

export interface MinimalCommunityData extends ActivityTotals {
  actorId: string;
  subscribers: number;
  subscribersLocal: number;
  posts: number;
  comments: number;
}

const CURATED_MIN_MONTHLY_USERS = 5;

function sumActivity(items: ActivityTotals[]): ActivityTotals {
  return items.reduce<ActivityTotals>(
    (totals, item) => ({
      usersActiveDay: totals.usersActiveDay + item.usersActiveDay,
      usersActiveWeek: totals.usersActiveWeek + item.usersActiveWeek,
      usersActiveMonth: totals.usersActiveMonth + item.usersActiveMonth,
      usersActiveHalfYear: totals.usersActiveHalfYear + item.usersActiveHalfYear,
    }),
    { usersActiveDay: 0, usersActiveWeek: 0, usersActiveMonth: 0, usersActiveHalfYear: 0 }
  );
}

/**
 * Roll crawl results up into instance and community totals. Instances are
 * ordered by monthly active users, busiest first; community listings move
 * from the instances into the community totals.
 */
export function fullInstanceData(
  results: CrawlResult[],
  startTime: Date,
  endTime: Date = new Date()
): { instances: TotalInstanceStats<InstanceDetail>; communities: TotalCommunityStats<CommunitySummary> } {
  const sorted = [...results].sort((a, b) => b.counts.usersActiveMonth - a.counts.usersActiveMonth);

  const instanceDetails: InstanceDetail[] = [];
  const communityDetails: CommunitySummary[] = [];
  for (const { communities, ...detail } of sorted) {
    instanceDetails.push(detail);
    if (communities) communityDetails.push(...communities);
  }

  const counts = instanceDetails.map((detail) => detail.counts);
  const instances: TotalInstanceStats<InstanceDetail> = {
    crawledInstances: instanceDetails.length,
    totalUsers: counts.reduce((sum, c) => sum + c.users, 0),
    posts: counts.reduce((sum, c) => sum + c.posts, 0),
    comments: counts.reduce((sum, c) => sum + c.comments, 0),
    ...sumActivity(counts),
    startTime: startTime.toISOString(),
    endTime: endTime.toISOString(),
    instanceDetails,
  };

  const communities: TotalCommunityStats<CommunitySummary> = {
    crawledCommunities: communityDetails.length,
    subscribers: communityDetails.reduce((sum, c) => sum + c.subscribers, 0),
    subscribersLocal: communityDetails.reduce((sum, c) => sum + c.subscribersLocal, 0),
    posts: communityDetails.reduce((sum, c) => sum + c.posts, 0),
    comments: communityDetails.reduce((sum, c) => sum + c.comments, 0),
    ...sumActivity(communityDetails),
    startTime: startTime.toISOString(),
    endTime: endTime.toISOString(),
    communityDetails,
  };

  return { instances, communities };
}

/**
 * Instances fit for recommending to new users: sign-ups are screened (an
 * application or a captcha), more than five monthly active users, and no
 * content warning. Peer lists are dropped to keep the file small.
 */
export function curatedInstanceData(
  stats: TotalInstanceStats<InstanceDetail>
): TotalInstanceStats<InstanceDetail> {
  const instanceDetails = stats.instanceDetails
    .filter((detail) => detail.site.registrationMode === 'RequireApplication' || detail.site.captchaEnabled)
    .filter((detail) => detail.counts.usersActiveMonth > CURATED_MIN_MONTHLY_USERS)
    .filter((detail) => detail.site.contentWarning === null)
    .map((detail) => ({ ...detail, federation: { linked: [], allowed: [], blocked: [] } }));

  return { ...stats, instanceDetails };
}

export function minimalInstanceData(
  stats: TotalInstanceStats<InstanceDetail>
): TotalInstanceStats<MinimalInstanceData> {
  return {
    ...stats,
    instanceDetails: stats.instanceDetails.map((detail) => ({
      domain: detail.domain,
      users: detail.counts.users,
      posts: detail.counts.posts,
      comments: detail.counts.comments,
      communities: detail.counts.communities,
      usersActiveDay: detail.counts.usersActiveDay,
      usersActiveWeek: detail.counts.usersActiveWeek,
      usersActiveMonth: detail.counts.usersActiveMonth,
      usersActiveHalfYear: detail.counts.usersActiveHalfYear,
    })),
  };
}

export function minimalCommunityData(
  stats: TotalCommunityStats<CommunitySummary>
): TotalCommunityStats<MinimalCommunityData> {
  return {
    ...stats,
    communityDetails: stats.communityDetails.map((community) => ({
      actorId: community.actorId,
      subscribers: community.subscribers,
      subscribersLocal: community.subscribersLocal,
      posts: community.posts,
      comments: community.comments,
      usersActiveDay: community.usersActiveDay,
      usersActiveWeek: community.usersActiveWeek,
      usersActiveMonth: community.usersActiveMonth,
      usersActiveHalfYear: community.usersActiveHalfYear,
    })),
  };
}
