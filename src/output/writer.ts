import fs from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import { gzip } from 'zlib';
import {
  curatedInstanceData,
  fullInstanceData,
  minimalCommunityData,
  minimalInstanceData,
} from './aggregate.js';
import type { CrawlReport } from '../types/index.js';

const gzipAsync = promisify(gzip);

export const OUTPUT_FILES = {
  full: 'full.json.gz',
  instances: 'instances.json',
  communities: 'communities.json',
  curated: 'curated.json',
} as const;

function toJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/** Write every output file for `report` under `outDir`; returns the paths written. */
export async function writeResults(outDir: string, report: CrawlReport): Promise<string[]> {
  await fs.mkdir(outDir, { recursive: true });

  const { instances, communities } = fullInstanceData(report.results, report.startedAt, report.finishedAt);
  const compressed = await gzipAsync(toJson({ instances, communities }), { level: 9 });

  const files: Array<[string, string | Buffer]> = [
    [OUTPUT_FILES.full, compressed],
    [OUTPUT_FILES.instances, toJson(minimalInstanceData(instances))],
    [OUTPUT_FILES.communities, toJson(minimalCommunityData(communities))],
    [OUTPUT_FILES.curated, toJson(curatedInstanceData(instances))],
  ];

  const written: string[] = [];
  for (const [name, contents] of files) {
    const target = path.join(outDir, name);
    await fs.writeFile(target, contents);
    written.push(target);
  }
  return written;
}
