import { Module } from '@nestjs/common';

import { FinderService } from './finder.service';
import { AppLoggerModule, SourceClientModule } from '../common';
import { AppConfigModule } from '../config';

@Module({
  imports: [AppConfigModule, AppLoggerModule, SourceClientModule],
  providers: [FinderService],
  exports: [FinderService],
})
export class FinderModule {}
