import { Type } from '@sinclair/typebox';

import { httpUrlSchema } from '../utils/schema.util';

export const checkerSchema = Type.Object(
  {
    testUrl: httpUrlSchema({
      default: 'http://httpbin.org/ip',
      description:
        'Endpoint requested through every candidate. A JSON body with an "origin" field is reported as the exit IP',
      examples: ['http://httpbin.org/ip', 'https://api.ipify.org?format=json'],
    }),
    timeoutMs: Type.Integer({
      minimum: 100,
      maximum: 120000,
      default: 10000,
      description: 'Time budget for a single liveness check in milliseconds',
    }),
    maxConcurrent: Type.Integer({
      minimum: 1,
      maximum: 500,
      default: 10,
      description: 'Number of candidates checked in parallel',
    }),
    output: Type.Object(
      {
        aliveList: Type.Boolean({
          default: true,
          description:
            'Write alive candidates to <input>_alive.txt next to the input file',
        }),
        report: Type.Boolean({
          default: true,
          description:
            'Write every check result to <input>_results.json next to the input file',
        }),
      },
      { default: {} },
    ),
  },
  {
    default: {},
    description: 'Proxy checker settings',
  },
);

export type CheckerConfig = typeof checkerSchema.static;
