import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import axios, {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import {
  AllSourcesFailedException,
  NoCandidatesFoundException,
} from './exceptions';
import { FinderService } from './finder.service';
import { formatCandidate } from '../candidates';
import { HostRateLimiter, SourceClientFactory } from '../common';
import { createTestConfigService } from '../testing';

type FakeRoute =
  | { body: string; status?: number }
  | { networkError: string };

/**
 * In-process stand-in for the network: an axios adapter that answers by URL
 * and records every request it sees.
 */
function createFakeHttp(routes: Record<string, FakeRoute>) {
  const requests: InternalAxiosRequestConfig[] = [];

  const instance = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      const route = config.url ? routes[config.url] : undefined;

      if (!route) {
        throw new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND', config);
      }
      if ('networkError' in route) {
        throw new AxiosError(route.networkError, route.networkError, config);
      }

      const response: AxiosResponse = {
        data: route.body,
        status: route.status ?? 200,
        statusText: 'fake',
        headers: {},
        config,
      };
      if (response.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${response.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          undefined,
          response,
        );
      }
      return response;
    },
  });

  return { httpService: new HttpService(instance), requests };
}

const LIST_A = 'https://list-a.test/proxies.txt';
const LIST_B = 'https://list-b.test/api/v1/get?type=http';
const LIST_C = 'https://list-c.test/';

describe('FinderService', () => {
  let dir: string;
  let outputFile: string;
  let rateLimiter: HostRateLimiter;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'finder-'));
    outputFile = join(dir, 'proxies.txt');
    rateLimiter = new HostRateLimiter();
  });

  afterEach(async () => {
    await rateLimiter.onModuleDestroy();
    await rm(dir, { recursive: true, force: true });
  });

  const createService = (
    routes: Record<string, FakeRoute>,
    finder: Record<string, unknown>,
    extraConfig: Record<string, unknown> = {},
  ) => {
    const configService = createTestConfigService({
      ...extraConfig,
      finder: { outputFile, ...finder },
    });
    const { httpService, requests } = createFakeHttp(routes);
    const clients = new SourceClientFactory(httpService, rateLimiter, configService);

    return { service: new FinderService(clients, configService), requests };
  };

  const sources = [
    { name: 'list-a', url: LIST_A, format: 'text' },
    { name: 'list-b', url: LIST_B, format: 'json' },
  ];

  test('merges sources in source order and removes duplicates', async () => {
    const { service } = createService(
      {
        [LIST_A]: { body: '1.2.3.4:80\n5.6.7.8:3128\n1.2.3.4:80\n' },
        [LIST_B]: {
          body: JSON.stringify([
            { ip: '5.6.7.8', port: '3128' },
            { ip: '9.9.9.9', port: '8080' },
          ]),
        },
      },
      { sources },
    );

    const report = await service.findCandidates();

    expect(report.candidates.map(formatCandidate)).toEqual([
      '1.2.3.4:80',
      '5.6.7.8:3128',
      '9.9.9.9:8080',
    ]);
    expect(report.sources).toEqual([
      { name: 'list-a', url: LIST_A, status: 'ok', found: 3 },
      { name: 'list-b', url: LIST_B, status: 'ok', found: 2 },
    ]);
  });

  test('skips a failing source and keeps the others', async () => {
    const { service } = createService(
      {
        [LIST_A]: { networkError: 'ECONNREFUSED' },
        [LIST_B]: { body: '["1.2.3.4:80"]' },
        [LIST_C]: { body: 'Service Unavailable', status: 503 },
      },
      {
        sources: [...sources, { name: 'list-c', url: LIST_C, format: 'html-table' }],
      },
    );

    const report = await service.findCandidates();

    expect(report.candidates.map(formatCandidate)).toEqual(['1.2.3.4:80']);
    expect(report.sources.map(({ name, status, error }) => ({ name, status, error }))).toEqual([
      {
        name: 'list-a',
        status: 'failed',
        error: 'Failed to fetch list-a: ECONNREFUSED',
      },
      { name: 'list-b', status: 'ok', error: undefined },
      {
        name: 'list-c',
        status: 'failed',
        error: 'Failed to fetch list-c: HTTP 503',
      },
    ]);
  });

  test('fails and writes nothing when every source is unreachable', async () => {
    const { service } = createService(
      {
        [LIST_A]: { networkError: 'ECONNREFUSED' },
        [LIST_B]: { networkError: 'ETIMEDOUT' },
      },
      { sources },
    );

    const failure = service.run();

    await expect(failure).rejects.toBeInstanceOf(AllSourcesFailedException);
    await expect(failure).rejects.toMatchObject({ exitCode: 1 });
    expect(existsSync(outputFile)).toBe(false);
  });

  test('fails when no source is enabled', async () => {
    const { service, requests } = createService(
      {},
      { sources: sources.map((source) => ({ ...source, enabled: false })) },
    );

    await expect(service.findCandidates()).rejects.toThrow(
      'No proxy-list source is enabled',
    );
    expect(requests).toHaveLength(0);
  });

  test('fails when the sources answer without any candidate', async () => {
    const { service } = createService(
      {
        [LIST_A]: { body: 'nothing here' },
        [LIST_B]: { body: '[]' },
      },
      { sources },
    );

    await expect(service.run()).rejects.toBeInstanceOf(
      NoCandidatesFoundException,
    );
    expect(existsSync(outputFile)).toBe(false);
  });

  test('caps the number of candidates taken from each source', async () => {
    const { service } = createService(
      {
        [LIST_A]: { body: '1.1.1.1:80\n2.2.2.2:80\n3.3.3.3:80\n' },
        [LIST_B]: { body: '["4.4.4.4:80", "5.5.5.5:80"]' },
      },
      { sources, maxCandidatesPerSource: 1 },
    );

    const report = await service.findCandidates();

    expect(report.candidates.map(formatCandidate)).toEqual([
      '1.1.1.1:80',
      '4.4.4.4:80',
    ]);
    expect(report.sources.map((source) => source.found)).toEqual([3, 2]);
  });

  test('handles a source with hundreds of thousands of lines', async () => {
    const total = 300_000;
    const lines = Array.from(
      { length: total },
      (_, i) => `10.${(i >> 16) & 255}.${(i >> 8) & 255}.${i & 255}:8080`,
    );
    const { service } = createService(
      { [LIST_A]: { body: lines.join('\n') } },
      { sources: [sources[0]] },
    );

    const report = await service.findCandidates();

    expect(report.candidates).toHaveLength(total);
    expect(formatCandidate(report.candidates[total - 1])).toBe(
      '10.4.147.223:8080',
    );
    expect(report.sources[0]).toMatchObject({ status: 'ok', found: total });
  }, 30_000);

  test('does not fetch disabled sources', async () => {
    const { service, requests } = createService(
      { [LIST_A]: { body: '1.2.3.4:80' } },
      { sources: [sources[0], { ...sources[1], enabled: false }] },
    );

    await service.findCandidates();

    expect(requests.map((request) => request.url)).toEqual([LIST_A]);
  });

  test('writes the same duplicate-free file on every run', async () => {
    const routes = {
      [LIST_A]: { body: '1.2.3.4:80\n1.2.3.4:80\n5.6.7.8:81\n' },
      [LIST_B]: { body: '["5.6.7.8:81", "1.2.3.4:080"]' },
    };
    const { service } = createService(routes, { sources });

    await service.run();
    const first = await readFile(outputFile, 'utf8');
    await service.run();
    const second = await readFile(outputFile, 'utf8');

    expect(first).toBe('1.2.3.4:80\n5.6.7.8:81\n');
    expect(second).toBe(first);
  });

  test('requests the body as text with a browser user agent and the source timeout', async () => {
    const { service, requests } = createService(
      { [LIST_A]: { body: '1.2.3.4:80' } },
      { sources: [{ ...sources[0], timeoutMs: 4000 }] },
    );

    await service.findCandidates();

    expect(requests).toHaveLength(1);
    expect(requests[0].responseType).toBe('text');
    expect(requests[0].timeout).toBe(4000);
    expect(requests[0].headers.get('User-Agent')).toEqual(
      expect.stringContaining('Mozilla/5.0'),
    );
    expect(requests[0].httpsAgent).toBeUndefined();
  });

  test('routes sources that ask for it through the upstream proxy', async () => {
    const { service, requests } = createService(
      { [LIST_A]: { body: '1.2.3.4:80' } },
      { sources: [{ ...sources[0], useProxy: true }] },
      { proxy: 'http://upstream.test:8080' },
    );

    await service.findCandidates();

    const agent = requests[0].httpsAgent;
    expect(agent).toBeInstanceOf(HttpsProxyAgent);
    expect(agent instanceof HttpsProxyAgent && agent.proxy.host).toBe(
      'upstream.test:8080',
    );
    expect(requests[0].proxy).toBe(false);
  });

  test('reports a source that needs the upstream proxy when none is configured', async () => {
    const { service } = createService(
      { [LIST_B]: { body: '["1.2.3.4:80"]' } },
      { sources: [{ ...sources[0], useProxy: true }, sources[1]] },
    );

    const report = await service.findCandidates();

    expect(report.sources[0]).toMatchObject({
      status: 'failed',
      error:
        'Failed to fetch list-a: Upstream proxy is enabled for a source but config.proxy is not set.',
    });
  });

  test('applies per-source rate limiting', async () => {
    const { service } = createService(
      { [LIST_A]: { body: '1.2.3.4:80' } },
      { sources: [{ ...sources[0], rps: 5 }] },
    );

    const report = await service.findCandidates();

    expect(report.candidates.map(formatCandidate)).toEqual(['1.2.3.4:80']);
  });
});
