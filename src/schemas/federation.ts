import { z } from 'zod';
import { NaiveTimestampSchema, OffsetTimestampSchema } from './site.js';

export const InstanceV019Schema = z.object({
  id: z.number(),
  domain: z.string(),
  published: OffsetTimestampSchema,
  updated: OffsetTimestampSchema.nullish(),
  software: z.string().nullish(),
  version: z.string().nullish(),
  federation_state: z.unknown().optional(),
});

export const InstanceV018Schema = z.object({
  id: z.number(),
  domain: z.string(),
  published: NaiveTimestampSchema,
  updated: NaiveTimestampSchema.nullish(),
  software: z.string().nullish(),
  version: z.string().nullish(),
});

export const FederatedInstancesV019Schema = z.object({
  linked: z.array(InstanceV019Schema),
  allowed: z.array(InstanceV019Schema).default([]),
  blocked: z.array(InstanceV019Schema).default([]),
});

export const FederatedInstancesV018Schema = z.object({
  linked: z.array(InstanceV018Schema),
  allowed: z.array(z.unknown()).default([]),
  blocked: z.array(z.unknown()).default([]),
});

export const GetFederatedInstancesResponseV019Schema = z.object({
  federated_instances: FederatedInstancesV019Schema.nullable(),
});

export const GetFederatedInstancesResponseV018Schema = z.object({
  federated_instances: FederatedInstancesV018Schema.nullable(),
});

export type InstanceV019 = z.infer<typeof InstanceV019Schema>;
export type InstanceV018 = z.infer<typeof InstanceV018Schema>;
export type FederatedInstancesV019 = z.infer<typeof FederatedInstancesV019Schema>;
export type FederatedInstancesV018 = z.infer<typeof FederatedInstancesV018Schema>;
