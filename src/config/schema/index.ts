export { yamlValidationSchema } from './yaml.schema';
export { DEFAULT_SOURCES } from './finder.schema';
export type { CheckerConfig } from './checker.schema';
export type { FinderConfig, SourceConfig } from './finder.schema';
export type { LoggerConfig } from './logger.schema';
export type { ProxyConfig } from './proxy.schema';
