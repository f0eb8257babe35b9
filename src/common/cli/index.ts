export { handleFatalError, registerProcessHandlers, runCli } from './cli-runner';
