/**
 * Todos API
 * Main entry point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Todos API');
  const app = await NestFactory.create(AppModule);

  configureApp(app);

  const config = app.get(ConfigService);
  const corsOrigin = config.get<string>('corsOrigin');
  if (corsOrigin) {
    app.enableCors({
      origin: corsOrigin,
      credentials: true,
    });
  } else {
    logger.warn('CORS_ORIGIN not set - cross-origin requests are disabled');
  }

  const port = config.get<number>('port') ?? 3000;
  await app.listen(port);

  logger.log(`Todos API listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Todos API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
