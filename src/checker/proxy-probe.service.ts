import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';

import { CheckResult } from './check-result.interface';
import { buildProxyRoute } from './proxy-route';
import { formatCandidate, ProxyCandidate } from '../candidates';
import { describeRequestError, getRandomUserAgent } from '../common';
import { AppConfigService } from '../config';

function readExitIp(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  for (const key of ['origin', 'ip']) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

/** One liveness check: a single GET to the test endpoint via the candidate. */
@Injectable()
export class ProxyProbeService {
  constructor(
    private readonly httpService: HttpService,
    private readonly configService: AppConfigService,
  ) {}

  async probe(candidate: ProxyCandidate): Promise<CheckResult> {
    const { testUrl, timeoutMs } = this.configService.get('checker');
    const proxy = formatCandidate(candidate);
    const startedAt = performance.now();

    try {
      const response = await this.httpService.axiosRef.request<unknown>({
        method: 'GET',
        url: testUrl,
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          'User-Agent': getRandomUserAgent(),
          Connection: 'close',
        },
        ...buildProxyRoute(candidate, testUrl),
      });

      return {
        proxy,
        candidate,
        status: 'alive',
        latencyMs: Math.round(performance.now() - startedAt),
        exitIp: readExitIp(response.data),
      };
    } catch (error) {
      return {
        proxy,
        candidate,
        status: 'dead',
        error: describeRequestError(error),
      };
    }
  }
}
