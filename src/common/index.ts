export * from './cli';
export * from './exceptions';
export * from './http-client';
export * from './logger';
export * from './utils';
