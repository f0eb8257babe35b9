import { Type } from '@sinclair/typebox';

import { SOURCE_FORMATS } from '../constants';
import {
  httpUrlSchema,
  nullableLimitSchema,
  variantsSchema,
} from '../utils/schema.util';

export const DEFAULT_SOURCES = [
  {
    name: 'free-proxy-list.net',
    url: 'https://free-proxy-list.net/',
    format: 'html-table',
  },
  {
    name: 'proxy-list.download HTTP',
    url: 'https://www.proxy-list.download/api/v1/get?type=http',
    format: 'json',
  },
  {
    name: 'proxy-list.download HTTPS',
    url: 'https://www.proxy-list.download/api/v1/get?type=https',
    format: 'json',
  },
  {
    name: 'proxyscrape HTTP',
    url: 'https://api.proxyscrape.com/v2/?request=getproxies&protocol=http&timeout=10000&country=all&ssl=all&anonymity=all',
    format: 'text',
  },
] as const;

export const sourceSchema = Type.Object({
  name: Type.String({
    minLength: 1,
    description: 'Label used in logs and summaries',
  }),
  url: httpUrlSchema({
    description: 'Address of the proxy list',
    examples: ['https://example.com/proxies.txt'],
  }),
  format: variantsSchema(SOURCE_FORMATS, {
    default: 'text',
    description: 'How candidates are extracted from the response body',
  }),
  enabled: Type.Boolean({
    default: true,
    description: 'Enable or disable this source',
  }),
  timeoutMs: Type.Integer({
    minimum: 1000,
    default: 15000,
    description: 'Request timeout in milliseconds',
  }),
  useProxy: Type.Union(
    [
      Type.Boolean({
        description: 'Use the upstream proxy from config.proxy',
      }),
      Type.String({
        description: 'Custom upstream proxy URL for this source',
        pattern: '^https?://.+',
      }),
    ],
    {
      description:
        'Upstream proxy: true/false for the global proxy, or a URL string for a custom one',
      default: false,
    },
  ),
  rps: nullableLimitSchema({
    minimum: 0.0001,
    maximum: 1000,
    description: 'Requests per second allowed towards the source host',
    nullDescription: 'Disable RPS limiting',
  }),
});

export const finderSchema = Type.Object(
  {
    outputFile: Type.String({
      minLength: 1,
      default: 'proxies.txt',
      description: 'File the deduplicated candidates are written to',
    }),
    maxCandidatesPerSource: nullableLimitSchema({
      minimum: 1,
      integer: true,
      description: 'Maximum number of candidates taken from a single source',
      nullDescription: 'Take every candidate a source returns',
    }),
    sources: Type.Array(sourceSchema, {
      default: DEFAULT_SOURCES,
      description: 'Proxy-list sources fetched by the finder',
    }),
  },
  {
    default: {},
    description: 'Proxy finder settings',
  },
);

export type SourceConfig = typeof sourceSchema.static;
export type FinderConfig = typeof finderSchema.static;
