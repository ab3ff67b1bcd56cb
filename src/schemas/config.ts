import { z } from 'zod';
import { StartupError } from '../utils/errors.js';

export const DEFAULT_VERSION_URL = 'https://raw.githubusercontent.com/LemmyNet/lemmy-ansible/main/VERSION';

// Lists arrive comma separated from the environment and the command line.
const ListSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : value,
  z.array(z.string())
);

export const HttpConfigSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().default(10000),
  retries: z.coerce.number().int().min(0).default(3),
  retryDelay: z.coerce.number().int().min(0).default(500),
  userAgent: z.string().min(1).default('fedistats'),
  maxContentLength: z.coerce.number().int().positive().default(5 * 1024 * 1024),
});

export const CrawlConfigSchema = HttpConfigSchema.extend({
  seeds: ListSchema.default(['lemmy.ml']),
  exclude: ListSchema.default([]),
  workerCount: z.coerce.number().int().min(1).default(64),
  maxDistance: z.coerce.number().int().min(0).default(20),
  software: ListSchema.default(['lemmy']),
  versionUrl: z.string().url().default(DEFAULT_VERSION_URL),
  communities: z.boolean().default(true),
  communityPageLimit: z.coerce.number().int().positive().default(100),
  geoDatabase: z.string().min(1).optional(),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;
export type CrawlConfigInput = z.input<typeof CrawlConfigSchema>;

const ENV_KEYS = {
  seeds: 'FEDISTATS_SEEDS',
  exclude: 'FEDISTATS_EXCLUDE',
  workerCount: 'FEDISTATS_WORKERS',
  maxDistance: 'FEDISTATS_MAX_DISTANCE',
  timeoutMs: 'FEDISTATS_TIMEOUT_MS',
  geoDatabase: 'FEDISTATS_GEOIP_DB',
} as const;

/**
 * Resolve the crawl configuration: explicit overrides, then environment, then
 * schema defaults.
 */
export function loadCrawlConfig(
  overrides: CrawlConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): CrawlConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const parsed = CrawlConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StartupError(`Invalid crawl configuration: ${issues}`);
  }
  return parsed.data;
}
