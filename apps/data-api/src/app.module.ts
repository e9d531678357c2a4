/**
 * Fakehook Data API - App Module
 * Root module for the Data API service
 */

import { Module } from '@nestjs/common';
import { FakehookConfigModule } from '@fakehook/common/config';
import { PeopleApiModule } from './people/people-api.module';
import { WebhooksApiModule } from './webhooks/webhooks-api.module';
import { HealthController } from './health.controller';

@Module({
  imports: [FakehookConfigModule, PeopleApiModule, WebhooksApiModule],
  controllers: [HealthController],
})
export class AppModule {}
