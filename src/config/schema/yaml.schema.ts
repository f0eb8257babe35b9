import { Type } from '@sinclair/typebox';

import { checkerSchema } from './checker.schema';
import { finderSchema } from './finder.schema';
import { loggerSchema } from './logger.schema';
import { proxySchema } from './proxy.schema';

export const yamlValidationSchema = Type.Object(
  {
    logger: loggerSchema,
    proxy: proxySchema,
    finder: finderSchema,
    checker: checkerSchema,
  },
  {
    default: {},
  },
);
