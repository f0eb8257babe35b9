import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { HostRateLimiter } from './host-rate-limiter.service';
import { sanitizeUrlForLogging } from './url-sanitizer';
import { getRandomUserAgent } from '../utils';

export interface SourceClientOptions {
  sourceName: string;
  timeoutMs: number;
  rps: number | null;
  upstreamProxy?: string;
}

/** GETs proxy-list bodies as text for one source. */
export class SourceClient {
  private readonly logger = new Logger(SourceClient.name);

  constructor(
    private readonly options: SourceClientOptions,
    private readonly httpService: HttpService,
    private readonly rateLimiter: HostRateLimiter,
  ) {}

  fetchText(url: string): Promise<string> {
    return this.rateLimiter.run(url, this.options.rps, async () => {
      this.logger.debug(
        `GET ${sanitizeUrlForLogging(url)} (${this.options.sourceName})`,
      );
      const { data } = await this.httpService.axiosRef.request<unknown>(
        this.requestConfig(url),
      );
      return typeof data === 'string' ? data : JSON.stringify(data);
    });
  }

  private requestConfig(url: string): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      method: 'GET',
      url,
      responseType: 'text',
      timeout: this.options.timeoutMs,
      headers: { 'User-Agent': getRandomUserAgent() },
    };

    if (this.options.upstreamProxy) {
      const agent = new HttpsProxyAgent(this.options.upstreamProxy);
      config.httpAgent = agent;
      config.httpsAgent = agent;
      config.proxy = false;
    }

    return config;
  }
}
