/**
 * Fakehook Dispatch Runner - App Module
 */

import { Module } from '@nestjs/common';
import { FakehookConfigModule } from '@fakehook/common/config';
import { WebhookModule } from '@fakehook/common/webhook';
import { DispatchRunnerService } from './dispatch-runner.service';

@Module({
  imports: [FakehookConfigModule, WebhookModule],
  providers: [DispatchRunnerService],
})
export class AppModule {}
