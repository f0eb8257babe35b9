import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';

import { HostRateLimiter } from './host-rate-limiter.service';
import { SourceClientFactory } from './source-client.factory';

@Module({
  imports: [HttpModule],
  providers: [HostRateLimiter, SourceClientFactory],
  exports: [SourceClientFactory],
})
export class SourceClientModule {}
