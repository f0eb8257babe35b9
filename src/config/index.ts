export { AppConfigModule } from './config.module';
export { AppConfigService } from './config.service';
export { parseConfig } from './loaders';
export type { Config } from './types';
export type {
  CheckerConfig,
  FinderConfig,
  LoggerConfig,
  SourceConfig,
} from './schema';
export type { LoggerLevel, SourceFormat } from './constants';
