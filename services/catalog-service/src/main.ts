/**
 * Catalog service bootstrap.
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug'],
  });

  configureApp(app);

  // Closes the database and Redis connections on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port', 3000);
  await app.listen(port);

  logger.log(`Catalog service is running on: http://localhost:${port}`);
  logger.log(`Health check: http://localhost:${port}/health`);
  logger.log(`Metrics: http://localhost:${port}/health/metrics`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : error}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
