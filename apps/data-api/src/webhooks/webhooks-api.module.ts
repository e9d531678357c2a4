/**
 * Webhooks API Module
 */

import { Module } from '@nestjs/common';
import { WebhookModule } from '@fakehook/common/webhook';
import { WebhooksController } from './webhooks.controller';

@Module({
  imports: [WebhookModule],
  controllers: [WebhooksController],
})
export class WebhooksApiModule {}
