import { describe, it, expect } from 'vitest';
import { Crawler } from '../crawler/orchestrator.js';
import { loadCrawlConfig, type CrawlConfigInput } from '../schemas/config.js';
import { createLogger } from '../utils/logger.js';
import { StartupError } from '../utils/errors.js';
import type { CrawlReport, CrawlerDependencies, GeoLookup } from '../types/index.js';
import { FakeSource, communitySummary, type FakeInstance } from './fixtures/lemmy.js';

const logger = createLogger({ name: 'test', level: 'error' });
const versions = { getText: async () => '0.19.5' };

function crawl(
  instances: Record<string, FakeInstance>,
  options: CrawlConfigInput,
  deps: CrawlerDependencies = {}
): Promise<CrawlReport> {
  const config = loadCrawlConfig({ workerCount: 4, communities: false, ...options }, {});
  return new Crawler(config, { source: new FakeSource(instances), versions, geo: null, logger, ...deps }).run();
}

function domains(report: CrawlReport): string[] {
  return report.results.map((result) => result.domain).sort();
}

describe('Crawler', () => {
  it('follows linked peers and skips addresses that are not hostnames', async () => {
    const report = await crawl(
      {
        'a.example': { linked: ['b.example', '!!bad'] },
        'b.example': { linked: ['a.example'] },
      },
      { seeds: ['a.example'] }
    );

    expect(domains(report)).toEqual(['a.example', 'b.example']);
    const distances = Object.fromEntries(report.results.map((r) => [r.domain, r.distance]));
    expect(distances).toEqual({ 'a.example': 0, 'b.example': 1 });
    expect(report.stats.succeeded).toBe(2);
    expect(report.stats.failed).toBe(0);
    expect(report.minimumVersion).toBe('0.18.5');
    expect(report.jobsProcessed).toBe(2);
  });

  it('yields only the seed when it links itself, a bad token and an unreachable peer', async () => {
    const source = new FakeSource({
      'a.example': { linked: ['a.example', '!!bad', 'b.example'] },
    });
    const report = await crawl({}, { seeds: ['a.example'], maxDistance: 1, workerCount: 64 }, { source });

    expect(report.results.map((r) => [r.domain, r.distance])).toEqual([['a.example', 0]]);
    expect(source.fetched).toEqual(['a.example', 'b.example']);
    expect(report.stats.failures.transport).toBe(1);
    expect(report.jobsProcessed).toBe(2);
  });

  it('crawls each instance once when seeds link to each other', async () => {
    const source = new FakeSource({
      'a.example': { linked: ['b.example'] },
      'b.example': { linked: ['a.example'] },
    });
    const report = await crawl({}, { seeds: ['a.example', 'b.example'] }, { source });

    expect(domains(report)).toEqual(['a.example', 'b.example']);
    expect([...source.fetched].sort()).toEqual(['a.example', 'b.example']);
  });

  it('counts a repeated seed as a duplicate', async () => {
    const report = await crawl({ 'a.example': {} }, { seeds: ['a.example', 'A.example'] });

    expect(domains(report)).toEqual(['a.example']);
    expect(report.stats.rejected.duplicate).toBe(1);
    expect(report.jobsProcessed).toBe(2);
  });

  it('finishes with a single result when the seed has no peers', async () => {
    const report = await crawl({ 'a.example': {} }, { seeds: ['a.example'] });
    expect(domains(report)).toEqual(['a.example']);
  });

  it('never contacts excluded instances', async () => {
    const source = new FakeSource({
      'a.example': { linked: ['b.example', 'c.example'] },
      'b.example': {},
      'c.example': {},
    });
    const report = await crawl({}, { seeds: ['a.example'], exclude: ['B.example'] }, { source });

    expect(domains(report)).toEqual(['a.example', 'c.example']);
    expect(source.fetched).not.toContain('b.example');
  });

  it('stops expanding at the maximum distance', async () => {
    const source = new FakeSource({
      'a.example': { linked: ['b.example'] },
      'b.example': { linked: ['c.example'] },
      'c.example': { linked: ['d.example'] },
      'd.example': {},
    });
    const report = await crawl({}, { seeds: ['a.example'], maxDistance: 1 }, { source });

    expect(domains(report)).toEqual(['a.example', 'b.example']);
    expect(source.fetched).not.toContain('c.example');
  });

  it('drops instances whose site claims another host', async () => {
    const report = await crawl(
      {
        'a.example': { linked: ['b.example'] },
        'b.example': { actorId: 'https://other.example/' },
      },
      { seeds: ['a.example'] }
    );

    expect(domains(report)).toEqual(['a.example']);
    expect(report.stats.failures.identity).toBe(1);
  });

  it('drops other software and outdated releases as policy failures', async () => {
    const report = await crawl(
      {
        'a.example': { linked: ['b.example', 'c.example'] },
        'b.example': { software: 'mastodon', version: '4.2.0' },
        'c.example': { version: '0.18.4' },
      },
      { seeds: ['a.example'] }
    );

    expect(domains(report)).toEqual(['a.example']);
    expect(report.stats.failures.policy).toBe(2);
  });

  it('counts unreachable instances as transport failures', async () => {
    const report = await crawl(
      { 'a.example': { linked: ['gone.example'] } },
      { seeds: ['a.example'] }
    );

    expect(domains(report)).toEqual(['a.example']);
    expect(report.stats.failures.transport).toBe(1);
    expect(report.stats.failed).toBe(1);
  });

  it('omits enrichment that fails without failing the instance', async () => {
    const geo: GeoLookup = {
      locate: async () => {
        throw new Error('no such host');
      },
    };
    const report = await crawl(
      {
        'a.example': { linked: ['b.example'], communities: new Error('HTTP 500') },
        'b.example': { communities: [communitySummary('https://b.example/c/news')] },
      },
      { seeds: ['a.example'], communities: true },
      { geo }
    );

    const byDomain = new Map(report.results.map((r) => [r.domain, r]));
    expect(byDomain.get('a.example')?.communities).toBeUndefined();
    expect(byDomain.get('b.example')?.communities).toEqual([communitySummary('https://b.example/c/news')]);
    expect(byDomain.get('a.example')?.geo).toBeUndefined();
    expect(report.stats.succeeded).toBe(2);
  });

  it('ignores invalid and excluded seeds and terminates with nothing to do', async () => {
    const report = await crawl({ 'a.example': {} }, { seeds: ['!!bad', 'a.example'], exclude: ['a.example'] });

    expect(report.results).toEqual([]);
    expect(report.stats.succeeded).toBe(0);
    expect(report.jobsProcessed).toBe(0);
  });

  it('normalizes seeds given as urls', async () => {
    const report = await crawl({ 'a.example': {} }, { seeds: ['https://A.example/'] });
    expect(domains(report)).toEqual(['a.example']);
  });

  it('refuses to start without a published version', async () => {
    const run = crawl(
      { 'a.example': {} },
      { seeds: ['a.example'] },
      { versions: { getText: async () => 'not-a-version' } }
    );
    await expect(run).rejects.toThrow(StartupError);
  });
});
