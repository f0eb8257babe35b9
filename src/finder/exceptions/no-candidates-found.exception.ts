import { CliException } from '../../common/exceptions';

export class NoCandidatesFoundException extends CliException {
  readonly exitCode = 1;

  constructor(public readonly respondingSources: number) {
    super(
      `No proxy candidates found in ${respondingSources} responding sources`,
      'NoCandidatesFoundException',
    );
  }
}
