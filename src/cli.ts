#!/usr/bin/env node
import fs from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { Crawler } from './crawler/orchestrator.js';
import { writeResults } from './output/writer.js';
import { loadCrawlConfig, type CrawlConfigInput } from './schemas/config.js';
import { createLogger, defaultLogLevel } from './utils/logger.js';
import { StartupError, describeError } from './utils/errors.js';

export interface CrawlCommandOptions {
  seeds?: string;
  exclude?: string;
  workers?: string;
  maxDistance?: string;
  timeoutMs?: string;
  communities: boolean;
  geoip?: string;
  out: string;
  verbose: boolean;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/** Map command line flags onto config overrides; flags left unset fall through to the environment. */
export function toCrawlConfig(options: CrawlCommandOptions): CrawlConfigInput {
  return {
    seeds: options.seeds,
    exclude: options.exclude,
    workerCount: toNumber(options.workers),
    maxDistance: toNumber(options.maxDistance),
    timeoutMs: toNumber(options.timeoutMs),
    communities: options.communities,
    geoDatabase: options.geoip,
  };
}

async function crawlCommand(options: CrawlCommandOptions): Promise<void> {
  const logger = createLogger({
    name: 'fedistats',
    level: options.verbose ? 'debug' : defaultLogLevel(),
  });

  const config = loadCrawlConfig(toCrawlConfig(options));
  logger.info(`Seeds: ${config.seeds.join(', ')}`);

  const report = await new Crawler(config, { logger }).run();
  const written = await writeResults(options.out, report);

  const { stats } = report;
  logger.info(`Crawled ${stats.succeeded} instances, ${stats.failed} failed`, {
    failures: stats.failures,
    rejected: stats.rejected,
  });
  for (const file of written) {
    logger.info(`Wrote ${file}`);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program.name('fedistats').description('Crawl Lemmy instances and collect network statistics');

  program
    .command('crawl')
    .description('Crawl the network outward from the seed instances')
    .option('--seeds <domains>', 'Comma separated seed domains')
    .option('--exclude <domains>', 'Comma separated domains to skip')
    .option('--workers <number>', 'Concurrent crawl workers')
    .option('--max-distance <number>', 'Maximum hops from a seed')
    .option('--timeout-ms <ms>', 'Per-request timeout in ms')
    .option('--no-communities', 'Skip community listings')
    .option('--geoip <path>', 'MaxMind city database for geolocation')
    .option('--out <dir>', 'Output directory', 'output')
    .option('--verbose', 'Log every instance', false)
    .action(async (options: CrawlCommandOptions) => {
      await crawlCommand(options);
    });

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

// The bin link resolves to this file, so compare real paths.
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    if (error instanceof StartupError) {
      console.error(`Cannot start crawl: ${error.message}`);
    } else {
      console.error('Fatal error:', describeError(error));
    }
    process.exit(1);
  });
}
