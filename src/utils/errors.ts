export type CrawlErrorKind = 'transport' | 'schema' | 'identity' | 'policy';

/**
 * Base for every per-instance failure. These never abort a crawl: the worker
 * records the kind and drops the job.
 */
export abstract class CrawlError extends Error {
  abstract readonly kind: CrawlErrorKind;
  readonly domain: string;

  constructor(domain: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.domain = domain;
  }
}

export class TransportError extends CrawlError {
  readonly kind = 'transport';
  readonly status: number | null;
  readonly transient: boolean;

  constructor(
    domain: string,
    message: string,
    details: { status?: number | null; transient?: boolean; cause?: unknown } = {}
  ) {
    super(domain, message, { cause: details.cause });
    this.name = 'TransportError';
    this.status = details.status ?? null;
    this.transient = details.transient ?? false;
  }
}

export class SchemaError extends CrawlError {
  readonly kind = 'schema';

  constructor(domain: string, message: string) {
    super(domain, message);
    this.name = 'SchemaError';
  }
}

export class IdentityError extends CrawlError {
  readonly kind = 'identity';

  constructor(domain: string, message: string) {
    super(domain, message);
    this.name = 'IdentityError';
  }
}

export class PolicyError extends CrawlError {
  readonly kind = 'policy';

  constructor(domain: string, message: string) {
    super(domain, message);
    this.name = 'PolicyError';
  }
}

/** Raised before any job runs; rejects the whole crawl. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
