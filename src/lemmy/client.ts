import type { HttpClient } from '../http/client.js';
import { SiteView } from './site-view.js';
import {
  NODEINFO_REL_PREFIX,
  NodeInfoSchema,
  NodeInfoWellKnownSchema,
  type NodeInfo,
} from '../schemas/nodeinfo.js';
import { ListCommunitiesResponseSchema, type CommunityView } from '../schemas/community.js';
import { SchemaError, TransportError } from '../utils/errors.js';
import type { CommunitySummary, InstanceDetails, InstanceSource } from '../types/index.js';

export const COMMUNITY_PAGE_SIZE = 50;

function toCommunitySummary(view: CommunityView): CommunitySummary {
  const { community, counts } = view;
  return {
    actorId: community.actor_id,
    name: community.name,
    title: community.title,
    nsfw: community.nsfw,
    subscribers: counts.subscribers,
    subscribersLocal: counts.subscribers_local,
    posts: counts.posts,
    comments: counts.comments,
    usersActiveDay: counts.users_active_day,
    usersActiveWeek: counts.users_active_week,
    usersActiveMonth: counts.users_active_month,
    usersActiveHalfYear: counts.users_active_half_year,
  };
}

/**
 * Talks to one instance over its public API. All calls go over HTTPS to the
 * bare domain; redirects are not followed.
 */
export class LemmyClient implements InstanceSource {
  private readonly http: HttpClient;

  constructor(http: HttpClient) {
    this.http = http;
  }

  /**
   * NodeInfo, site and federation requests run together and must all succeed.
   */
  async fetchInstance(domain: string): Promise<InstanceDetails> {
    const [nodeInfo, site, federation] = await Promise.all([
      this.fetchNodeInfo(domain),
      this.http.getJson(`https://${domain}/api/v3/site`),
      this.fetchFederatedInstances(domain),
    ]);

    return { nodeInfo, site: SiteView.decode(domain, site, federation) };
  }

  /**
   * `/nodeinfo/2.0.json` first; when that does not answer with a usable
   * document, follow the `.well-known/nodeinfo` discovery links.
   */
  async fetchNodeInfo(domain: string): Promise<NodeInfo> {
    try {
      return await this.fetchNodeInfoAt(domain, `https://${domain}/nodeinfo/2.0.json`);
    } catch (error) {
      if (!(error instanceof TransportError) && !(error instanceof SchemaError)) throw error;
      const href = await this.discoverNodeInfo(domain);
      return this.fetchNodeInfoAt(domain, href);
    }
  }

  private async fetchNodeInfoAt(domain: string, url: string): Promise<NodeInfo> {
    const body = await this.http.getJson(url);
    const parsed = NodeInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new SchemaError(domain, `NodeInfo at ${url} does not match schema`);
    }
    return parsed.data;
  }

  private async discoverNodeInfo(domain: string): Promise<string> {
    const body = await this.http.getJson(`https://${domain}/.well-known/nodeinfo`);
    const parsed = NodeInfoWellKnownSchema.safeParse(body);
    if (!parsed.success) {
      throw new SchemaError(domain, 'NodeInfo discovery document does not match schema');
    }

    const [newest] = parsed.data.links
      .filter((link) => link.rel.startsWith(NODEINFO_REL_PREFIX))
      .sort((a, b) => b.rel.localeCompare(a.rel));
    if (!newest) {
      throw new SchemaError(domain, 'NodeInfo discovery document has no 2.x link');
    }
    return newest.href;
  }

  /** Resolves to `undefined` when the instance predates the endpoint. */
  private async fetchFederatedInstances(domain: string): Promise<unknown> {
    try {
      return await this.http.getJson(`https://${domain}/api/v3/federated_instances`);
    } catch (error) {
      if (error instanceof TransportError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async fetchCommunities(domain: string, pageLimit: number): Promise<CommunitySummary[]> {
    const communities: CommunitySummary[] = [];

    for (let page = 1; page <= pageLimit; page++) {
      const url =
        `https://${domain}/api/v3/community/list` +
        `?type_=Local&sort=New&limit=${COMMUNITY_PAGE_SIZE}&page=${page}`;
      const parsed = ListCommunitiesResponseSchema.safeParse(await this.http.getJson(url));
      if (!parsed.success) {
        throw new SchemaError(domain, `Community list page ${page} does not match schema`);
      }

      communities.push(...parsed.data.communities.map(toCommunitySummary));
      if (parsed.data.communities.length < COMMUNITY_PAGE_SIZE) break;
    }

    return communities;
  }
}
