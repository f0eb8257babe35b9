export abstract class CliException extends Error {
  abstract readonly exitCode: number;

  protected constructor(message: string, name: string) {
    super(message);
    this.name = name;
  }
}
