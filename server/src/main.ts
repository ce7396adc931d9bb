/**
 * Atrium Roomserver - NestJS Main Entry Point
 *
 * Bootstraps the roomserver internal API with security middleware,
 * validation and graceful shutdown.
 */

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port', 7770);
  await app.listen(port);

  logger.log(
    `Roomserver for ${configService.get<string>('app.serverName')} is running on: http://localhost:${port}`,
  );
}

bootstrap().catch((err: unknown) => {
  logger.error('Roomserver failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
