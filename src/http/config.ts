import http from 'http';
import https from 'https';
import type { AxiosRequestConfig } from 'axios';
import type { TransportOptions } from '../types/index.js';

export const DEFAULT_MAX_CONTENT_LENGTH = 5 * 1024 * 1024; // 5MB

/**
 * Connection settings shared by every request of a crawl. The network is a long
 * tail of small hosts, so each host gets at most two sockets and keeps one idle.
 */
export class TransportConfig {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly maxSocketsPerHost: number;
  private readonly maxContentLength: number;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: TransportOptions = {}) {
    this.timeout = options.timeoutMs ?? 10000;
    this.userAgent = options.userAgent ?? 'fedistats';
    this.maxSocketsPerHost = options.maxSocketsPerHost ?? 2;
    this.maxContentLength = options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
    this.httpAgent = new http.Agent(this.agentOptions());
    this.httpsAgent = new https.Agent(this.agentOptions());
  }

  private agentOptions(): http.AgentOptions {
    return {
      keepAlive: true,
      maxSockets: this.maxSocketsPerHost,
      maxFreeSockets: 1,
      // Inactivity limit; also closes pooled sockets nobody picks up again.
      timeout: this.timeout,
      scheduling: 'lifo',
    };
  }

  getRequestConfig(): AxiosRequestConfig {
    return {
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      timeout: this.timeout,
      maxRedirects: 0,
      maxContentLength: this.maxContentLength,
      maxBodyLength: this.maxContentLength,
      responseType: 'text',
      responseEncoding: 'utf8',
      // Statuses are classified by the client, not thrown by axios.
      validateStatus: () => true,
      headers: {
        'User-Agent': this.userAgent,
        'Accept': 'application/json, text/plain;q=0.9, */*;q=0.1',
      },
    };
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
