import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';

import { HostRateLimiter } from './host-rate-limiter.service';
import { SourceClient } from './source-client';
import { resolveUpstreamProxy } from './upstream-proxy';
import { AppConfigService, SourceConfig } from '../../config';

@Injectable()
export class SourceClientFactory {
  constructor(
    private readonly httpService: HttpService,
    private readonly rateLimiter: HostRateLimiter,
    private readonly configService: AppConfigService,
  ) {}

  forSource(source: SourceConfig): SourceClient {
    return new SourceClient(
      {
        sourceName: source.name,
        timeoutMs: source.timeoutMs,
        rps: source.rps,
        upstreamProxy: resolveUpstreamProxy(
          source.useProxy,
          this.configService.get('proxy'),
        ),
      },
      this.httpService,
      this.rateLimiter,
    );
  }
}
