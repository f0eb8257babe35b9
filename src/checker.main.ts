import 'reflect-metadata';

import { serializeCandidates } from './candidates';
import { CheckerModule, CheckerService, parseCheckerArgs } from './checker';
import { handleFatalError, registerProcessHandlers, runCli } from './common';

registerProcessHandlers();

async function bootstrap(): Promise<void> {
  const inputPath = parseCheckerArgs(process.argv.slice(2));

  await runCli(CheckerModule, async (app) => {
    const report = await app.get(CheckerService).run(inputPath);
    process.stdout.write(serializeCandidates(report.alive));
  });
}

bootstrap().catch(handleFatalError);
