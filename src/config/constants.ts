export const LOGGER_LEVELS = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
] as const;

export const SOURCE_FORMATS = ['text', 'json', 'html-table'] as const;

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export type LoggerLevel = (typeof LOGGER_LEVELS)[number];
export type SourceFormat = (typeof SOURCE_FORMATS)[number];
