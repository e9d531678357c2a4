/**
 * Fakehook Webhook Service
 * Serializes person records and POSTs them to a webhook capture endpoint
 */

import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import retry from 'async-retry';
import { ERRORS, FakehookError } from '@fakehook/common/errors';
import { PeopleService } from '@fakehook/common/people';
import {
  DispatchResult,
  GenerationRequest,
  Person,
} from '@fakehook/common/types';

/**
 * Raised inside the retry loop for 5xx responses so they are retried
 */
class UpstreamStatusError extends Error {
  constructor(readonly status: number) {
    super(`Upstream responded with status ${status}`);
    this.name = 'UpstreamStatusError';
  }
}

@Injectable()
export class WebhookService {
  private readonly logger = new Logger(WebhookService.name);
  private readonly defaultUrl?: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryMinTimeoutMs: number;

  constructor(
    private httpService: HttpService,
    private configService: ConfigService,
    private peopleService: PeopleService,
  ) {
    this.defaultUrl = this.configService.get<string>('webhookUrl');
    this.timeoutMs = this.configService.get<number>('webhookTimeoutMs', 10000);
    this.retries = this.configService.get<number>('webhookRetries', 0);
    this.retryMinTimeoutMs = this.configService.get<number>(
      'webhookRetryMinTimeoutMs',
      500,
    );
  }

  /**
   * Generate people and send them to the webhook
   * Uses the configured WEBHOOK_URL when no url is given
   */
  async dispatch(
    request: GenerationRequest,
    url?: string,
  ): Promise<DispatchResult> {
    const targetUrl = url ?? this.defaultUrl;
    if (!targetUrl) {
      throw ERRORS.WebhookUrlMissing();
    }

    const { people } = this.peopleService.generate(request);
    return this.send(targetUrl, people);
  }

  /**
   * POST records as one JSON array
   * Transport errors and 5xx responses are retried, 4xx responses are not
   */
  async send(url: string, records: Person[]): Promise<DispatchResult> {
    const body = JSON.stringify(records);
    const startedAt = Date.now();
    let attempts = 0;

    this.logger.log(`Sending ${records.length} records to ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await retry(
        async () => {
          attempts += 1;
          const res = await firstValueFrom(
            this.httpService.post<unknown>(url, body, {
              headers: {
                'Content-Type': 'application/json',
                Accept: 'application/json',
              },
              timeout: this.timeoutMs,
              validateStatus: () => true,
            }),
          );
          if (res.status >= 500) {
            throw new UpstreamStatusError(res.status);
          }
          return res;
        },
        {
          retries: this.retries,
          minTimeout: this.retryMinTimeoutMs,
          maxTimeout: 10000,
          onRetry: (error, attempt) => {
            this.logger.warn(
              `Webhook retry attempt ${attempt}/${this.retries}: ${
                error instanceof Error ? error.message : String(error)
              }`,
            );
          },
        },
      );
    } catch (error) {
      throw this.dispatchFailed(url, error);
    }

    if (response.status >= 400) {
      this.logger.error(
        `Webhook dispatch to ${url} rejected with status ${response.status}`,
      );
      throw ERRORS.WebhookDispatchFailed(url, response.status);
    }

    const durationMs = Date.now() - startedAt;
    this.logger.log(
      `Webhook accepted ${records.length} records (status ${response.status}, ${durationMs}ms)`,
    );

    return {
      url,
      status_code: response.status,
      records_sent: records.length,
      bytes_sent: Buffer.byteLength(body, 'utf8'),
      duration_ms: durationMs,
      attempts,
    };
  }

  private dispatchFailed(url: string, error: unknown): FakehookError {
    if (error instanceof UpstreamStatusError) {
      this.logger.error(
        `Webhook dispatch to ${url} failed with status ${error.status}`,
      );
      return ERRORS.WebhookDispatchFailed(url, error.status, error);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Webhook dispatch to ${url} failed: ${cause.message}`);
    return ERRORS.WebhookDispatchFailed(url, undefined, cause);
  }
}
