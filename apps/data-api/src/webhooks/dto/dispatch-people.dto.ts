/**
 * Dispatch People DTOs
 */

import { IsOptional, IsUrl } from 'class-validator';
import { DispatchResult } from '@fakehook/common/types';
import { GeneratePeopleDto } from '../../people/dto/generate-people.dto';

export class DispatchPeopleDto extends GeneratePeopleDto {
  @IsUrl({
    protocols: ['http', 'https'],
    require_protocol: true,
    require_tld: false,
  })
  @IsOptional()
  url?: string; // Default: WEBHOOK_URL
}

export type DispatchResultDto = DispatchResult;
