import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import { TransportConfig } from './config.js';
import { backoffDelay, delay } from '../utils/delay.js';
import { hostnameOf } from '../utils/domain.js';
import { SchemaError, TransportError, describeError } from '../utils/errors.js';
import type { HttpClientOptions, HttpResponse } from '../types/index.js';

const TRANSIENT_STATUSES = new Set([408, 429]);

function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Shared HTTP client for one crawl. Transient failures (no response, 408, 429,
 * 5xx) are retried with exponential backoff; anything else fails at once,
 * including a body over `maxContentLength`.
 */
export class HttpClient {
  private readonly transport: TransportConfig;
  private readonly axios: AxiosInstance;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly logger: Logger | null;

  constructor(options: HttpClientOptions = {}) {
    this.transport = new TransportConfig(options);
    this.axios = axios.create(this.transport.getRequestConfig());
    this.retries = options.retries ?? 3;
    this.retryDelay = options.retryDelay ?? 500;
    this.logger = options.logger ?? null;
  }

  async makeRequest(url: string): Promise<HttpResponse> {
    const domain = hostnameOf(url) ?? url;
    const attempts = this.retries + 1;

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.attempt(url, domain);
      if (!(outcome instanceof TransportError)) return outcome;
      if (!outcome.transient || attempt >= attempts) throw outcome;

      const backoff = backoffDelay(this.retryDelay, attempt);
      this.logger?.debug(`Retrying ${url} in ${backoff}ms`, {
        attempt,
        attempts,
        error: outcome.message,
      });
      await delay(backoff);
    }
  }

  private async attempt(url: string, domain: string): Promise<HttpResponse | TransportError> {
    try {
      const response = await this.axios.get<string>(url);
      const data = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);

      if (response.status >= 200 && response.status < 300) {
        return { status: response.status, data, url };
      }
      return new TransportError(domain, `HTTP ${response.status} for ${url}`, {
        status: response.status,
        transient: isTransientStatus(response.status),
      });
    } catch (error) {
      const code = axios.isAxiosError(error) ? error.code : undefined;
      const suffix = code ? ` (${code})` : '';
      // ERR_BAD_RESPONSE: body over maxContentLength.
      return new TransportError(domain, `Request to ${url} failed: ${describeError(error)}${suffix}`, {
        transient: code !== 'ERR_BAD_RESPONSE',
        cause: error,
      });
    }
  }

  async getText(url: string): Promise<string> {
    const response = await this.makeRequest(url);
    return response.data;
  }

  /** Fetch and JSON-decode a body. Shape validation is left to the caller. */
  async getJson(url: string): Promise<unknown> {
    const response = await this.makeRequest(url);
    try {
      const parsed: unknown = JSON.parse(response.data);
      return parsed;
    } catch {
      throw new SchemaError(hostnameOf(url) ?? url, `Response from ${url} is not valid JSON`);
    }
  }

  destroy(): void {
    this.transport.destroy();
  }
}
