import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';

import { CheckerService } from './checker.service';
import { ProxyProbeService } from './proxy-probe.service';
import { AppLoggerModule } from '../common';
import { AppConfigModule } from '../config';

@Module({
  imports: [AppConfigModule, AppLoggerModule, HttpModule],
  providers: [CheckerService, ProxyProbeService],
  exports: [CheckerService],
})
export class CheckerModule {}
