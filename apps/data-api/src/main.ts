/**
 * Fakehook Data API
 * Main entry point for the fake data HTTP service
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Data API');
  const app = configureApp(await NestFactory.create(AppModule));

  const port = app.get(ConfigService).get<number>('dataApiPort', 8010);
  if (isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${process.env.DATA_API_PORT}`);
  }
  await app.listen(port);

  logger.log(`Data API listening on port ${port}`);
}

bootstrap().catch((error: Error) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Data API', error.stack);
  process.exit(1);
});
