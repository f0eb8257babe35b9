import { isAxiosError } from 'axios';

import { describeRequestError } from '../../common/http-client';

/** A single source could not be fetched. Never fatal on its own. */
export class SourceFetchException extends Error {
  constructor(
    public readonly sourceName: string,
    public readonly reason: string,
    public readonly statusCode?: number,
  ) {
    super(`Failed to fetch ${sourceName}: ${reason}`);
    this.name = 'SourceFetchException';
  }

  static fromError(sourceName: string, error: unknown): SourceFetchException {
    const statusCode = isAxiosError(error) ? error.response?.status : undefined;
    const exception = new SourceFetchException(
      sourceName,
      describeRequestError(error),
      statusCode,
    );
    exception.cause = error;
    return exception;
  }
}
