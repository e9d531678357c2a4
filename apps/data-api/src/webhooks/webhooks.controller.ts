/**
 * Webhooks Controller
 * Dispatch generated people and inspect what webhook.site captured
 */

import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { WebhookService, WebhookSiteService } from '@fakehook/common/webhook';
import {
  CapturedPeople,
  CapturedRequestPage,
  WebhookToken,
} from '@fakehook/common/types';
import { DispatchPeopleDto, DispatchResultDto } from './dto/dispatch-people.dto';
import { ListRequestsQueryDto } from './dto/list-requests.dto';

@Controller('api/webhooks')
export class WebhooksController {
  constructor(
    private webhookService: WebhookService,
    private webhookSiteService: WebhookSiteService,
  ) {}

  /**
   * POST /api/webhooks/dispatch
   * Generate people and POST them to the webhook
   */
  @Post('dispatch')
  @HttpCode(HttpStatus.OK)
  async dispatch(@Body() dto: DispatchPeopleDto): Promise<DispatchResultDto> {
    const { url, ...request } = dto;
    return this.webhookService.dispatch(request, url);
  }

  /**
   * POST /api/webhooks/tokens
   * Create a webhook.site capture URL
   */
  @Post('tokens')
  @HttpCode(HttpStatus.CREATED)
  async createToken(): Promise<WebhookToken> {
    return this.webhookSiteService.createToken();
  }

  @Get('tokens/:tokenId/requests')
  async listRequests(
    @Param('tokenId') tokenId: string,
    @Query() query: ListRequestsQueryDto,
  ): Promise<CapturedRequestPage> {
    return this.webhookSiteService.listRequests(tokenId, query);
  }

  @Get('tokens/:tokenId/people')
  async latestPeople(
    @Param('tokenId') tokenId: string,
  ): Promise<CapturedPeople> {
    return this.webhookSiteService.latestPeople(tokenId);
  }
}
