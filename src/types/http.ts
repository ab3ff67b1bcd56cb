import type { Logger } from 'winston';

export interface TransportOptions {
  timeoutMs?: number;
  userAgent?: string;
  maxSocketsPerHost?: number;
  /** Largest response body accepted, in bytes. */
  maxContentLength?: number;
}

export interface HttpClientOptions extends TransportOptions {
  retries?: number;
  retryDelay?: number;
  logger?: Logger;
}

export interface HttpResponse {
  status: number;
  data: string;
  url: string;
}
