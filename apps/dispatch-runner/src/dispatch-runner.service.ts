/**
 * Dispatch Runner Service
 * Generates one batch of people and sends it to the configured webhook
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WebhookService, WebhookSiteService } from '@fakehook/common/webhook';
import { DispatchResult } from '@fakehook/common/types';

@Injectable()
export class DispatchRunnerService {
  private readonly logger = new Logger(DispatchRunnerService.name);
  private readonly count: number;
  private readonly webhookUrl?: string;
  private readonly createToken: boolean;

  constructor(
    private webhookService: WebhookService,
    private webhookSiteService: WebhookSiteService,
    private configService: ConfigService,
  ) {
    this.count = this.configService.get<number>('dispatchCount', 10);
    this.webhookUrl = this.configService.get<string>('webhookUrl');
    this.createToken = this.configService.get<boolean>('dispatchCreateToken', false);
  }

  async run(): Promise<DispatchResult> {
    const url = await this.resolveUrl();
    const result = await this.webhookService.dispatch({ count: this.count }, url);

    this.logger.log(
      `Sent ${result.records_sent} people to ${result.url} (status ${result.status_code}, ${result.bytes_sent} bytes, ${result.attempts} attempt(s))`,
    );
    return result;
  }

  /**
   * Configured WEBHOOK_URL, or a fresh webhook.site URL when
   * DISPATCH_CREATE_TOKEN is set. Undefined leaves the choice to
   * WebhookService, which rejects the dispatch.
   */
  private async resolveUrl(): Promise<string | undefined> {
    if (this.webhookUrl || !this.createToken) {
      return this.webhookUrl;
    }

    const token = await this.webhookSiteService.createToken();
    this.logger.log(`Inspect captured requests at ${token.url}`);
    return token.url;
  }
}
