import {
  GetSiteResponseLegacySchema,
  GetSiteResponseV018Schema,
  GetSiteResponseV019Schema,
  type GetSiteResponseLegacy,
  type GetSiteResponseV018,
  type GetSiteResponseV019,
  type LegacyFederatedInstances,
} from '../schemas/site.js';
import {
  GetFederatedInstancesResponseV018Schema,
  GetFederatedInstancesResponseV019Schema,
  type FederatedInstancesV018,
  type FederatedInstancesV019,
} from '../schemas/federation.js';
import { SchemaError } from '../utils/errors.js';
import type {
  ActivityWindow,
  FederatedPeers,
  SiteCountsSummary,
  SiteSchemaVersion,
  SiteSummary,
} from '../types/index.js';

type DecodedSite =
  | { schema: 'v0.19'; response: GetSiteResponseV019; federation: FederatedInstancesV019 | null }
  | { schema: 'v0.18'; response: GetSiteResponseV018; federation: FederatedInstancesV018 | null }
  | { schema: 'legacy'; response: GetSiteResponseLegacy; federation: LegacyFederatedInstances | null };

interface SchemaVariant {
  readonly schema: SiteSchemaVersion;
  /**
   * `federation` is the body of the federated instances endpoint, or
   * `undefined` when the instance does not serve it.
   */
  decode(site: unknown, federation: unknown): DecodedSite | null;
}

// Newest first; the first variant that decodes both payloads wins.
const VARIANTS: readonly SchemaVariant[] = [
  {
    schema: 'v0.19',
    decode(site, federation) {
      if (federation === undefined) return null;
      const response = GetSiteResponseV019Schema.safeParse(site);
      if (!response.success) return null;
      const peers = GetFederatedInstancesResponseV019Schema.safeParse(federation);
      if (!peers.success) return null;
      return { schema: 'v0.19', response: response.data, federation: peers.data.federated_instances };
    },
  },
  {
    schema: 'v0.18',
    decode(site, federation) {
      if (federation === undefined) return null;
      const response = GetSiteResponseV018Schema.safeParse(site);
      if (!response.success) return null;
      const peers = GetFederatedInstancesResponseV018Schema.safeParse(federation);
      if (!peers.success) return null;
      return { schema: 'v0.18', response: response.data, federation: peers.data.federated_instances };
    },
  },
  {
    schema: 'legacy',
    decode(site) {
      const response = GetSiteResponseLegacySchema.safeParse(site);
      if (!response.success) return null;
      return { schema: 'legacy', response: response.data, federation: response.data.federated_instances ?? null };
    },
  },
];

function uniqueDomains(domains: string[]): string[] {
  return Array.from(new Set(domains.map((domain) => domain.trim().toLowerCase())));
}

/**
 * One view over every supported generation of the site API. Callers never
 * look at the schema version themselves.
 */
export class SiteView {
  private readonly decoded: DecodedSite;

  private constructor(decoded: DecodedSite) {
    this.decoded = decoded;
  }

  static decode(domain: string, site: unknown, federation: unknown): SiteView {
    for (const variant of VARIANTS) {
      const decoded = variant.decode(site, federation);
      if (decoded) return new SiteView(decoded);
    }
    throw new SchemaError(domain, 'Site response matches no known schema');
  }

  get schema(): SiteSchemaVersion {
    return this.decoded.schema;
  }

  version(): string {
    return this.decoded.response.version;
  }

  totalUsers(): number {
    return this.decoded.response.site_view.counts.users;
  }

  activeUsers(window: ActivityWindow): number {
    const counts = this.decoded.response.site_view.counts;
    switch (window) {
      case 'day':
        return counts.users_active_day;
      case 'week':
        return counts.users_active_week;
      case 'month':
        return counts.users_active_month;
      case 'halfyear':
        return counts.users_active_half_year;
    }
  }

  /** Canonical ActivityPub id of the site, e.g. `https://example.org/`. */
  actorIdentity(): string {
    return this.decoded.response.site_view.site.actor_id;
  }

  name(): string {
    return this.decoded.response.site_view.site.name;
  }

  federatedPeers(): FederatedPeers {
    switch (this.decoded.schema) {
      case 'v0.19': {
        const instances = this.decoded.federation;
        return {
          linked: uniqueDomains(instances?.linked.map((instance) => instance.domain) ?? []),
          allowed: uniqueDomains(instances?.allowed.map((instance) => instance.domain) ?? []),
          blocked: uniqueDomains(instances?.blocked.map((instance) => instance.domain) ?? []),
        };
      }
      case 'v0.18': {
        const instances = this.decoded.federation;
        return {
          linked: uniqueDomains(instances?.linked.map((instance) => instance.domain) ?? []),
          allowed: [],
          blocked: [],
        };
      }
      case 'legacy': {
        const instances = this.decoded.federation;
        return {
          linked: uniqueDomains(instances?.linked ?? []),
          allowed: uniqueDomains(instances?.allowed ?? []),
          blocked: uniqueDomains(instances?.blocked ?? []),
        };
      }
    }
  }

  counts(): SiteCountsSummary {
    const counts = this.decoded.response.site_view.counts;
    return {
      users: counts.users,
      posts: counts.posts,
      comments: counts.comments,
      communities: counts.communities,
      usersActiveDay: counts.users_active_day,
      usersActiveWeek: counts.users_active_week,
      usersActiveMonth: counts.users_active_month,
      usersActiveHalfYear: counts.users_active_half_year,
    };
  }

  summary(): SiteSummary {
    const { site, local_site: localSite } = this.decoded.response.site_view;
    const contentWarning =
      this.decoded.schema === 'v0.19' ? this.decoded.response.site_view.site.content_warning ?? null : null;
    return {
      name: site.name,
      description: site.description ?? null,
      icon: site.icon ?? null,
      banner: site.banner ?? null,
      actorId: site.actor_id,
      contentWarning,
      registrationMode: localSite?.registration_mode ?? null,
      captchaEnabled: localSite?.captcha_enabled ?? false,
    };
  }
}
