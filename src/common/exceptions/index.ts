export { CliException } from './cli.exception';
