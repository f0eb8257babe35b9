export { SourceClientModule } from './source-client.module';
export { SourceClientFactory } from './source-client.factory';
export { SourceClient } from './source-client';
export { HostRateLimiter } from './host-rate-limiter.service';
export { resolveUpstreamProxy } from './upstream-proxy';
export { describeRequestError } from './request-error.util';
export { sanitizeUrlForLogging } from './url-sanitizer';
export type { SourceClientOptions } from './source-client';
export type { UseProxy } from './upstream-proxy';
