import { SourceConfig } from '../../config';
import { SourceFetchException } from '../exceptions';

/**
 * Rethrows anything raised while fetching a source as a
 * SourceFetchException naming that source (the first argument).
 */
export function HandleSourceError() {
  return <Args extends [SourceConfig, ...unknown[]], Result>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: Args) => Promise<Result>>,
  ): void => {
    const originalMethod = descriptor.value;
    if (!originalMethod) {
      return;
    }

    descriptor.value = async function (
      this: unknown,
      ...args: Args
    ): Promise<Result> {
      try {
        return await originalMethod.apply(this, args);
      } catch (error) {
        if (error instanceof SourceFetchException) {
          throw error;
        }
        throw SourceFetchException.fromError(args[0].name, error);
      }
    };
  };
}
