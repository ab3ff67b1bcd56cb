import { z } from 'zod';

// Timestamps are how the API generations tell themselves apart: 0.19 serializes
// them with a UTC offset, earlier releases without.
export const OffsetTimestampSchema = z.string().datetime({ offset: true });
export const NaiveTimestampSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?$/);

export const RegistrationModeSchema = z.enum(['Closed', 'RequireApplication', 'Open']);

export const SiteCountsSchema = z.object({
  users: z.number(),
  posts: z.number(),
  comments: z.number(),
  communities: z.number(),
  users_active_day: z.number(),
  users_active_week: z.number(),
  users_active_month: z.number(),
  users_active_half_year: z.number(),
});

export const LocalSiteSchema = z.object({
  registration_mode: RegistrationModeSchema,
  captcha_enabled: z.boolean().default(false),
  federation_enabled: z.boolean().default(true),
  private_instance: z.boolean().default(false),
});

const SiteBaseSchema = z.object({
  id: z.number(),
  name: z.string(),
  sidebar: z.string().nullish(),
  icon: z.string().nullish(),
  banner: z.string().nullish(),
  description: z.string().nullish(),
  actor_id: z.string(),
});

export const SiteV019Schema = SiteBaseSchema.extend({
  published: OffsetTimestampSchema,
  updated: OffsetTimestampSchema.nullish(),
  content_warning: z.string().nullish(),
});

export const SiteV018Schema = SiteBaseSchema.extend({
  published: NaiveTimestampSchema,
  updated: NaiveTimestampSchema.nullish(),
});

export const GetSiteResponseV019Schema = z.object({
  site_view: z.object({
    site: SiteV019Schema,
    local_site: LocalSiteSchema,
    counts: SiteCountsSchema,
  }),
  version: z.string(),
  admins: z.array(z.unknown()).default([]),
});

export const GetSiteResponseV018Schema = z.object({
  site_view: z.object({
    site: SiteV018Schema,
    local_site: LocalSiteSchema,
    counts: SiteCountsSchema,
  }),
  version: z.string(),
  admins: z.array(z.unknown()).default([]),
  // From 0.18 on federation data lives on its own endpoint; an inline list
  // marks an older release.
  federated_instances: z.undefined(),
});

export const LegacyFederatedInstancesSchema = z.object({
  linked: z.array(z.string()),
  allowed: z.array(z.string()).nullish(),
  blocked: z.array(z.string()).nullish(),
});

export const GetSiteResponseLegacySchema = z.object({
  site_view: z.object({
    site: SiteV018Schema.partial({ id: true }),
    local_site: LocalSiteSchema.optional(),
    counts: SiteCountsSchema,
  }),
  version: z.string(),
  online: z.number(),
  federated_instances: LegacyFederatedInstancesSchema.nullish(),
});

export type RegistrationMode = z.infer<typeof RegistrationModeSchema>;
export type SiteCounts = z.infer<typeof SiteCountsSchema>;
export type GetSiteResponseV019 = z.infer<typeof GetSiteResponseV019Schema>;
export type GetSiteResponseV018 = z.infer<typeof GetSiteResponseV018Schema>;
export type GetSiteResponseLegacy = z.infer<typeof GetSiteResponseLegacySchema>;
export type LegacyFederatedInstances = z.infer<typeof LegacyFederatedInstancesSchema>;
