import { CliException } from '../../common/exceptions';

export class ProxyListReadException extends CliException {
  readonly exitCode = 1;

  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Cannot read proxy list ${path}: ${reason}`,
      'ProxyListReadException',
    );
    this.cause = cause;
  }
}
