import 'reflect-metadata';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';

import { AppModule } from '@/app.module';
import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import { ScoutExceptionFilter } from '@/infra/http/scout-exception.filter';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new ScoutExceptionFilter(app.get(HttpAdapterHost).httpAdapter));
  app.enableShutdownHooks();

  const config = app.get<ScoutConfig>(scoutConfig.KEY);
  await app.listen(config.httpPort);
  logger.log(`HTTP server listening on port ${config.httpPort}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
