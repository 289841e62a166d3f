import { Module } from '@nestjs/common';
import { ConfigService } from './services/config.service';
import { LoggerService } from './services/logger.service';

@Module({
  providers: [
    { provide: ConfigService, useFactory: () => ConfigService.getInstance() },
    LoggerService,
  ],
  exports: [
    ConfigService, //
    LoggerService,
  ],
})
export class CoreModule {}
