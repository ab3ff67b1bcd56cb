import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { gunzipSync } from 'zlib';
import { OUTPUT_FILES, writeResults } from '../output/writer.js';
import type { CrawlReport } from '../types/index.js';
import { crawlResult } from './fixtures/lemmy.js';

const report: CrawlReport = {
  results: [crawlResult('a.example')],
  stats: {
    succeeded: 1,
    failed: 0,
    failures: { transport: 0, schema: 0, identity: 0, policy: 0, unexpected: 0 },
    rejected: { duplicate: 0, invalid: 0, excluded: 0, distance: 0 },
  },
  jobsProcessed: 1,
  minimumVersion: '0.18.5',
  startedAt: new Date('2024-01-01T00:00:00.000Z'),
  finishedAt: new Date('2024-01-01T01:00:00.000Z'),
};

describe('writeResults', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fedistats-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes every output file into a new directory', async () => {
    const out = path.join(dir, 'output');
    const written = await writeResults(out, report);

    expect(written).toEqual([
      path.join(out, OUTPUT_FILES.full),
      path.join(out, OUTPUT_FILES.instances),
      path.join(out, OUTPUT_FILES.communities),
      path.join(out, OUTPUT_FILES.curated),
    ]);
  });

  it('compresses the full dump', async () => {
    await writeResults(dir, report);
    const full: unknown = JSON.parse(gunzipSync(await fs.readFile(path.join(dir, OUTPUT_FILES.full))).toString('utf8'));

    expect(full).toMatchObject({
      instances: { crawledInstances: 1, instanceDetails: [{ domain: 'a.example', schema: 'v0.19' }] },
      communities: { crawledCommunities: 0 },
    });
  });

  it('writes the minimal instance list as plain JSON', async () => {
    await writeResults(dir, report);
    const instances: unknown = JSON.parse(await fs.readFile(path.join(dir, OUTPUT_FILES.instances), 'utf8'));

    expect(instances).toMatchObject({
      crawledInstances: 1,
      startTime: '2024-01-01T00:00:00.000Z',
      instanceDetails: [{ domain: 'a.example', users: 100, usersActiveMonth: 10 }],
    });
  });
});
