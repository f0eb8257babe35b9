import { Module } from '@nestjs/common';
import { LoggerModule, Params } from 'nestjs-pino';
import pino from 'pino';

import { AppConfigService } from '../../config';

const STDERR_FD = 2;

/**
 * Pino-backed Nest logger. Everything goes to stderr so stdout stays free
 * for program output.
 */
@Module({
  imports: [
    LoggerModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (configService: AppConfigService): Params => {
        const { level, isPrettyEnabled } = configService.get('logger');
        const options = {
          level,
          customLevels: {
            verbose: 10,
          },
          useOnlyCustomLevels: false,
        };

        if (isPrettyEnabled) {
          return {
            pinoHttp: {
              ...options,
              transport: {
                target: 'pino-pretty',
                options: { destination: STDERR_FD },
              },
            },
          };
        }

        return {
          pinoHttp: [options, pino.destination(STDERR_FD)],
        };
      },
    }),
  ],
})
export class AppLoggerModule {}
