import { CliException } from '../common';

export const CHECKER_USAGE = [
  'Usage: proxy-checker <proxy_list_file>',
  'File should contain one proxy per line in format: host:port',
].join('\n');

export class UsageException extends CliException {
  readonly exitCode = 1;

  constructor() {
    super(CHECKER_USAGE, 'UsageException');
  }
}

/** Returns the single positional argument: the proxy list path. */
export function parseCheckerArgs(args: string[]): string {
  if (args.length !== 1 || !args[0].trim()) {
    throw new UsageException();
  }
  return args[0];
}
