import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger as PinoLogger } from 'nestjs-pino';

import { AppModule } from './bootstrap/app.module';
import { ConfigService } from './core/services/config.service';
import { GraphService } from './graph/graph.service';

const bootstrapLogger = new Logger('Bootstrap');

async function bootstrap() {
  const cfg = ConfigService.getInstance();

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  app.enableCors({
    origin: cfg.corsOrigins.length ? cfg.corsOrigins : true,
    methods: ['GET', 'HEAD', 'PUT', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept'],
    credentials: false,
  });
  await app.init();
  bootstrapLogger.log('Nest application initialized');

  if (cfg.graphAutoLoad) {
    const result = await app.get(GraphService).load();
    bootstrapLogger.log(`Graph auto-load ${JSON.stringify(result)}`);
  }

  await app.listen(cfg.port, cfg.host);
  bootstrapLogger.log(`HTTP server listening on ${cfg.host}:${cfg.port}`);
}

bootstrap().catch((error: unknown) => {
  const context =
    error instanceof Error
      ? {
          name: error.name,
          message: error.message,
          stack: error.stack,
        }
      : { error };
  bootstrapLogger.error(`Bootstrap failure ${JSON.stringify(context)}`);
  process.exit(1);
});
