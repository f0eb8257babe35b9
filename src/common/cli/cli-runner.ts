import { INestApplicationContext, Logger, Type } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';

import { CliException } from '../exceptions';

/**
 * Boots a standalone Nest context for `rootModule`, runs `task` against it
 * and always closes the context afterwards.
 */
export async function runCli<T>(
  rootModule: Type<unknown>,
  task: (app: INestApplicationContext) => Promise<T>,
): Promise<T> {
  const app = await NestFactory.createApplicationContext(rootModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(PinoLogger));
  app.flushLogs();

  try {
    return await task(app);
  } finally {
    await app.close();
  }
}

export function handleFatalError(error: unknown): never {
  const logger = new Logger('Bootstrap');

  if (error instanceof CliException) {
    logger.error(error.message);
    process.exit(error.exitCode);
  }

  // The pino logger may not be attached yet, so log a plain string
  logger.error(
    `Fatal error: ${error instanceof Error ? error.stack : String(error)}`,
  );
  process.exit(1);
}

export function registerProcessHandlers(): void {
  process.on('unhandledRejection', (reason, promise) => {
    const logger = new Logger('UnhandledRejection');
    logger.error(
      { err: reason, promise },
      'Unhandled promise rejection detected',
    );
  });

  process.on('uncaughtException', (error) => {
    const logger = new Logger('UncaughtException');
    logger.error({ err: error }, 'Uncaught exception detected');
  });
}
