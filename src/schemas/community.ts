import { z } from 'zod';

export const CommunityViewSchema = z.object({
  community: z.object({
    id: z.number(),
    name: z.string(),
    title: z.string(),
    actor_id: z.string(),
    nsfw: z.boolean().default(false),
  }),
  counts: z.object({
    subscribers: z.number(),
    // Only reported from 0.19 on.
    subscribers_local: z.number().default(0),
    posts: z.number(),
    comments: z.number(),
    users_active_day: z.number(),
    users_active_week: z.number(),
    users_active_month: z.number(),
    users_active_half_year: z.number(),
  }),
});

export const ListCommunitiesResponseSchema = z.object({
  communities: z.array(CommunityViewSchema),
});

export type CommunityView = z.infer<typeof CommunityViewSchema>;
export type ListCommunitiesResponse = z.infer<typeof ListCommunitiesResponseSchema>;
