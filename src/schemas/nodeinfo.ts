import { z } from 'zod';

export const NODEINFO_REL_PREFIX = 'http://nodeinfo.diaspora.software/ns/schema/2.';

export const NodeInfoWellKnownSchema = z.object({
  links: z.array(
    z.object({
      rel: z.string(),
      href: z.string().url(),
    })
  ),
});

export const NodeInfoSchema = z.object({
  version: z.string(),
  software: z.object({
    name: z.string(),
    version: z.string(),
  }),
  protocols: z.array(z.string()).default([]),
  usage: z
    .object({
      users: z
        .object({
          total: z.number().default(0),
          activeHalfyear: z.number().default(0),
          activeMonth: z.number().default(0),
        })
        .default({}),
      localPosts: z.number().default(0),
      localComments: z.number().default(0),
    })
    .default({}),
  openRegistrations: z.boolean().default(false),
});

export type NodeInfoWellKnown = z.infer<typeof NodeInfoWellKnownSchema>;
export type NodeInfo = z.infer<typeof NodeInfoSchema>;
