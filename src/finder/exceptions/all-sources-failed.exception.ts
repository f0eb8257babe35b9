import { CliException } from '../../common/exceptions';

export class AllSourcesFailedException extends CliException {
  readonly exitCode = 1;

  constructor(public readonly sourceCount: number) {
    super(
      sourceCount === 0
        ? 'No proxy-list source is enabled'
        : `All ${sourceCount} proxy-list sources failed`,
      'AllSourcesFailedException',
    );
  }
}
