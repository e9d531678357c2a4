/**
 * Fakehook Webhook Module
 * Outbound webhook dispatch and webhook.site inspection
 */

import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { PeopleModule } from '@fakehook/common/people';
import { WebhookService } from './webhook.service';
import { WebhookSiteService } from './webhook-site.service';

@Module({
  imports: [HttpModule, ConfigModule, PeopleModule],
  providers: [WebhookService, WebhookSiteService],
  exports: [WebhookService, WebhookSiteService],
})
export class WebhookModule {}
