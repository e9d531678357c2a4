/**
 * webhook.site Service
 * Client for the webhook.site token API: create capture URLs and read back
 * the requests they received
 */

import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { ERRORS } from '@fakehook/common/errors';
import { parsePeople } from '@fakehook/common/people';
import {
  CapturedPeople,
  CapturedRequest,
  CapturedRequestPage,
  RequestSorting,
  WebhookToken,
} from '@fakehook/common/types';

interface TokenResponse {
  uuid: string;
  created_at: string;
}

interface RawCapturedRequest {
  uuid: string;
  method: string;
  url: string;
  content: string | null;
  headers: Record<string, string[]> | null;
  created_at: string;
}

interface RequestsResponse {
  data: RawCapturedRequest[];
  total: number;
  current_page: number;
  is_last_page: boolean;
}

export interface ListRequestsOptions {
  page?: number;
  sorting?: RequestSorting;
}

@Injectable()
export class WebhookSiteService {
  private readonly logger = new Logger(WebhookSiteService.name);
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(
    private httpService: HttpService,
    private configService: ConfigService,
  ) {
    this.baseUrl = this.configService
      .get<string>('webhookSiteBaseUrl', 'https://webhook.site')
      .replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('webhookSiteApiKey');
    this.timeoutMs = this.configService.get<number>('webhookTimeoutMs', 10000);
  }

  /**
   * Create a new capture endpoint
   * POST /token
   */
  async createToken(): Promise<WebhookToken> {
    try {
      const response = await firstValueFrom(
        this.httpService.post<TokenResponse>(
          `${this.baseUrl}/token`,
          {},
          { headers: this.headers(), timeout: this.timeoutMs },
        ),
      );

      const token: WebhookToken = {
        uuid: response.data.uuid,
        url: `${this.baseUrl}/${response.data.uuid}`,
        created_at: response.data.created_at,
      };
      this.logger.log(`Created webhook.site token ${token.uuid}`);
      return token;
    } catch (error) {
      this.logger.error(`Failed to create webhook.site token: ${messageOf(error)}`);
      throw ERRORS.InspectionFailed('create token', toError(error));
    }
  }

  /**
   * List requests captured by a token
   * GET /token/{tokenId}/requests
   */
  async listRequests(
    tokenId: string,
    options: ListRequestsOptions = {},
  ): Promise<CapturedRequestPage> {
    const params = {
      page: options.page ?? 1,
      sorting: options.sorting ?? 'newest',
    };

    try {
      const response = await firstValueFrom(
        this.httpService.get<RequestsResponse>(
          `${this.baseUrl}/token/${encodeURIComponent(tokenId)}/requests`,
          { headers: this.headers(), params, timeout: this.timeoutMs },
        ),
      );

      return {
        total: response.data.total,
        page: response.data.current_page,
        is_last_page: response.data.is_last_page,
        requests: response.data.data.map((raw) => toCapturedRequest(raw)),
      };
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        this.logger.warn(`webhook.site token not found: ${tokenId}`);
        throw ERRORS.TokenNotFound(tokenId, error);
      }

      this.logger.error(
        `Failed to list requests for ${tokenId}: ${messageOf(error)}`,
      );
      throw ERRORS.InspectionFailed('list requests', toError(error));
    }
  }

  /**
   * Newest captured request whose body is a list of person records
   */
  async latestPeople(tokenId: string): Promise<CapturedPeople> {
    const page = await this.listRequests(tokenId, { sorting: 'newest' });

    for (const request of page.requests) {
      const people = parsePeople(request.json);
      if (people) {
        return {
          request_uuid: request.uuid,
          received_at: request.created_at,
          people,
        };
      }
    }

    throw ERRORS.CapturedRequestNotFound(tokenId);
  }

  private headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      ...(this.apiKey ? { 'Api-Key': this.apiKey } : {}),
    };
  }
}

function toCapturedRequest(raw: RawCapturedRequest): CapturedRequest {
  const content = raw.content ?? '';
  return {
    uuid: raw.uuid,
    method: raw.method,
    url: raw.url,
    content,
    headers: raw.headers ?? {},
    created_at: raw.created_at,
    json: parseJson(content),
  };
}

function parseJson(content: string): unknown | null {
  if (content.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(content);
  } catch {
    // Body is not JSON
    return null;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function messageOf(error: unknown): string {
  return toError(error).message;
}
