import 'reflect-metadata';

import { Logger } from '@nestjs/common';

import { handleFatalError, registerProcessHandlers, runCli } from './common';
import { FinderModule, FinderService } from './finder';

registerProcessHandlers();

async function bootstrap(): Promise<void> {
  await runCli(FinderModule, async (app) => {
    const report = await app.get(FinderService).run();
    const failed = report.sources.filter((source) => source.status === 'failed');

    new Logger('Bootstrap').log(
      `Done: ${report.candidates.length} candidates from ${report.sources.length - failed.length}/${report.sources.length} sources`,
    );
  });
}

bootstrap().catch(handleFatalError);
