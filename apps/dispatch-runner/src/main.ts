/**
 * Fakehook Dispatch Runner
 * One-shot process: generate people, POST them to the webhook, exit
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { DispatchRunnerService } from './dispatch-runner.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    await app.get(DispatchRunnerService).run();
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: Error) => {
  const logger = new Logger('Dispatch Runner');
  logger.error(`Dispatch failed: ${error.message}`, error.stack);
  process.exit(1);
});
