import { DynamicModule, Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import type { Options as PinoHttpOptions } from 'pino-http';

import { CoreModule } from '../core/core.module';
import { ConfigService } from '../core/services/config.service';
import { GraphApiModule } from '../graph/graph-api.module';

export const createPinoHttpOptions = (config: ConfigService): PinoHttpOptions => ({
  level: config.logLevel,
  customLogLevel: (_req, res, error) => {
    if (error instanceof Error) return 'error';
    if (res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'silent';
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["set-cookie"]'],
    censor: '[REDACTED]',
  },
});

const createLoggerModule = (): DynamicModule =>
  LoggerModule.forRootAsync({
    imports: [CoreModule],
    inject: [ConfigService],
    useFactory: (config: ConfigService) => ({ pinoHttp: createPinoHttpOptions(config) }),
  });

@Module({
  imports: [createLoggerModule(), CoreModule, GraphApiModule],
})
export class AppModule {}
