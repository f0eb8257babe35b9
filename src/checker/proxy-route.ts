import { AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { ProxyCandidate } from '../candidates';

export type ProxyRoute = Pick<AxiosRequestConfig, 'proxy' | 'httpsAgent'>;

/**
 * Plain http targets go through the candidate as a forward proxy; https
 * targets are tunnelled with CONNECT.
 */
export function buildProxyRoute(
  candidate: ProxyCandidate,
  targetUrl: string,
): ProxyRoute {
  const protocol = candidate.scheme ?? 'http';

  if (new URL(targetUrl).protocol === 'https:') {
    return {
      proxy: false,
      httpsAgent: new HttpsProxyAgent(
        `${protocol}://${candidate.host}:${candidate.port}`,
      ),
    };
  }

  return {
    proxy: {
      protocol,
      host: candidate.host,
      port: candidate.port,
    },
  };
}
