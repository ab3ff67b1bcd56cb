import { SiteView } from '../../lemmy/site-view.js';
import { NodeInfoSchema, type NodeInfo } from '../../schemas/nodeinfo.js';
import type { CommunitySummary, CrawlResult, InstanceDetails, InstanceSource } from '../../types/index.js';
import { TransportError } from '../../utils/errors.js';

export const OFFSET_TIMESTAMP = '2023-06-01T10:00:00Z';
export const NAIVE_TIMESTAMP = '2023-06-01T10:00:00.123456';

export interface SiteOptions {
  version?: string;
  actorId?: string;
  monthly?: number;
  registrationMode?: 'Closed' | 'RequireApplication' | 'Open';
  captcha?: boolean;
  contentWarning?: string | null;
}

export function siteCounts(monthly = 10) {
  return {
    users: 100,
    posts: 40,
    comments: 80,
    communities: 3,
    users_active_day: 1,
    users_active_week: 4,
    users_active_month: monthly,
    users_active_half_year: 20,
  };
}

export function siteV019(domain: string, options: SiteOptions = {}) {
  return {
    site_view: {
      site: {
        id: 1,
        name: domain,
        actor_id: options.actorId ?? `https://${domain}/`,
        published: OFFSET_TIMESTAMP,
        content_warning: options.contentWarning ?? null,
      },
      local_site: {
        registration_mode: options.registrationMode ?? 'Open',
        captcha_enabled: options.captcha ?? false,
      },
      counts: siteCounts(options.monthly),
    },
    version: options.version ?? '0.19.3',
    admins: [],
  };
}

export function siteV018(domain: string, options: SiteOptions = {}) {
  return {
    site_view: {
      site: {
        id: 1,
        name: domain,
        actor_id: options.actorId ?? `https://${domain}/`,
        published: NAIVE_TIMESTAMP,
      },
      local_site: {
        registration_mode: options.registrationMode ?? 'Open',
        captcha_enabled: options.captcha ?? false,
      },
      counts: siteCounts(options.monthly),
    },
    version: options.version ?? '0.18.5',
    admins: [],
  };
}

export function siteLegacy(
  domain: string,
  linked: string[],
  options: SiteOptions = {},
  lists: { allowed?: string[]; blocked?: string[] } = {}
) {
  return {
    site_view: {
      site: {
        name: domain,
        actor_id: options.actorId ?? `https://${domain}/`,
        published: NAIVE_TIMESTAMP,
      },
      counts: siteCounts(options.monthly),
    },
    version: options.version ?? '0.16.7',
    online: 3,
    federated_instances: { linked, allowed: lists.allowed ?? null, blocked: lists.blocked ?? null },
  };
}

export function federationV019(linked: string[], allowed: string[] = [], blocked: string[] = []) {
  const instance = (domain: string, index: number) => ({ id: index + 1, domain, published: OFFSET_TIMESTAMP });
  return {
    federated_instances: {
      linked: linked.map(instance),
      allowed: allowed.map(instance),
      blocked: blocked.map(instance),
    },
  };
}

export function federationV018(linked: string[]) {
  return {
    federated_instances: {
      linked: linked.map((domain, index) => ({ id: index + 1, domain, published: NAIVE_TIMESTAMP })),
    },
  };
}

export function nodeInfo(name = 'lemmy', version = '0.19.3'): NodeInfo {
  return NodeInfoSchema.parse({ version: '2.0', software: { name, version }, openRegistrations: true });
}

export function communityView(id: number, domain = 'a.example') {
  return {
    community: {
      id,
      name: `c${id}`,
      title: `Community ${id}`,
      actor_id: `https://${domain}/c/c${id}`,
      nsfw: false,
    },
    counts: {
      subscribers: 10,
      subscribers_local: 4,
      posts: 5,
      comments: 7,
      users_active_day: 1,
      users_active_week: 2,
      users_active_month: 3,
      users_active_half_year: 4,
    },
  };
}

export interface FakeInstance {
  software?: string;
  version?: string;
  actorId?: string;
  linked?: string[];
  communities?: CommunitySummary[] | Error;
}

/** In-memory InstanceSource; unknown domains fail the way an unreachable host would. */
export class FakeSource implements InstanceSource {
  private readonly instances: Map<string, FakeInstance>;
  readonly fetched: string[] = [];

  constructor(instances: Record<string, FakeInstance>) {
    this.instances = new Map(Object.entries(instances));
  }

  async fetchInstance(domain: string): Promise<InstanceDetails> {
    this.fetched.push(domain);
    await Promise.resolve();
    const instance = this.instances.get(domain);
    if (!instance) {
      throw new TransportError(domain, `Request to https://${domain}/ failed: getaddrinfo ENOTFOUND`, {
        transient: true,
      });
    }

    const version = instance.version ?? '0.19.3';
    const site = siteV019(domain, { version, actorId: instance.actorId });
    return {
      nodeInfo: nodeInfo(instance.software, version),
      site: SiteView.decode(domain, site, federationV019(instance.linked ?? [])),
    };
  }

  async fetchCommunities(domain: string): Promise<CommunitySummary[]> {
    const communities = this.instances.get(domain)?.communities ?? [];
    if (communities instanceof Error) throw communities;
    return communities;
  }
}

export function crawlResult(domain: string, overrides: Partial<CrawlResult> = {}): CrawlResult {
  return {
    domain,
    distance: 0,
    software: { name: 'lemmy', version: '0.19.3' },
    schema: 'v0.19',
    site: {
      name: domain,
      description: null,
      icon: null,
      banner: null,
      actorId: `https://${domain}/`,
      contentWarning: null,
      registrationMode: 'Open',
      captchaEnabled: false,
    },
    counts: {
      users: 100,
      posts: 40,
      comments: 80,
      communities: 3,
      usersActiveDay: 1,
      usersActiveWeek: 4,
      usersActiveMonth: 10,
      usersActiveHalfYear: 20,
    },
    openRegistrations: true,
    federation: { linked: [], allowed: [], blocked: [] },
    ...overrides,
  };
}

export function communitySummary(actorId: string, subscribers = 10): CommunitySummary {
  return {
    actorId,
    name: 'c',
    title: 'C',
    nsfw: false,
    subscribers,
    subscribersLocal: 4,
    posts: 5,
    comments: 7,
    usersActiveDay: 1,
    usersActiveWeek: 2,
    usersActiveMonth: 3,
    usersActiveHalfYear: 4,
  };
}
