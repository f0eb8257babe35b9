import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parseConfig, yamlLoader } from './yaml.loader';
import { DEFAULT_SOURCES } from '../schema';

describe('yamlLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = async (content: string): Promise<string> => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, content);
    return path;
  };

  test('falls back to defaults when an optional file is missing', () => {
    const config = yamlLoader(join(dir, 'config.yaml'), true);

    expect(config.logger).toEqual({ level: 'info', isPrettyEnabled: false });
    expect(config.proxy).toBeUndefined();
    expect(config.finder.outputFile).toBe('proxies.txt');
    expect(config.finder.maxCandidatesPerSource).toBeNull();
    expect(config.finder.sources.map((source) => source.name)).toEqual(
      DEFAULT_SOURCES.map((source) => source.name),
    );
    expect(config.checker).toEqual({
      testUrl: 'http://httpbin.org/ip',
      timeoutMs: 10000,
      maxConcurrent: 10,
      output: { aliveList: true, report: true },
    });
  });

  test('fails when a required file is missing', () => {
    expect(() => yamlLoader(join(dir, 'missing.yaml'))).toThrow(
      /Failed to read YAML config file/,
    );
  });

  test('treats an empty document as all defaults', async () => {
    const config = yamlLoader(await writeConfig(''));

    expect(config.checker.maxConcurrent).toBe(10);
  });

  test('merges a partial file with defaults and accepts empty sections', async () => {
    const path = await writeConfig(
      ['finder:', 'proxy:', 'checker:', '  maxConcurrent: 25', ''].join('\n'),
    );

    const config = yamlLoader(path);

    expect(config.proxy).toBeUndefined();
    expect(config.finder.outputFile).toBe('proxies.txt');
    expect(config.checker.maxConcurrent).toBe(25);
    expect(config.checker.timeoutMs).toBe(10000);
  });

  test('fills in per-source defaults', async () => {
    const path = await writeConfig(
      [
        'finder:',
        '  sources:',
        '    - name: local',
        '      url: http://lists.test/proxies.txt',
        '',
      ].join('\n'),
    );

    expect(yamlLoader(path).finder.sources).toEqual([
      {
        name: 'local',
        url: 'http://lists.test/proxies.txt',
        format: 'text',
        enabled: true,
        timeoutMs: 15000,
        useProxy: false,
        rps: null,
      },
    ]);
  });

  test('rejects a document that is not a mapping', async () => {
    const path = await writeConfig('- one\n- two\n');

    expect(() => yamlLoader(path)).toThrow(
      'YAML config file must contain a mapping at the top level',
    );
  });

  test('rejects invalid YAML', async () => {
    const path = await writeConfig('checker: [unclosed\n');

    expect(() => yamlLoader(path)).toThrow(/Failed to parse YAML config file/);
  });
});

describe('parseConfig', () => {
  test('names the offending field', () => {
    expect(() => parseConfig({ checker: { maxConcurrent: 0 } })).toThrow(
      /YAML configuration validation failed: checker\.maxConcurrent/,
    );
  });

  test('adds a hint for the section of the offending field', () => {
    expect(() => parseConfig({ checker: { maxConcurrent: 0 } })).toThrow(
      'Tip: checker timeouts are milliseconds and maxConcurrent is a worker count',
    );
  });

  test('rejects an unknown source format', () => {
    expect(() =>
      parseConfig({
        finder: {
          sources: [{ name: 'x', url: 'http://lists.test/', format: 'csv' }],
        },
      }),
    ).toThrow(/finder\.sources\.0\.format/);
  });

  test('rejects a proxy that is not an http(s) URL', () => {
    expect(() => parseConfig({ proxy: 'socks5://127.0.0.1:1080' })).toThrow(
      /YAML configuration validation failed: proxy/,
    );
  });
});
