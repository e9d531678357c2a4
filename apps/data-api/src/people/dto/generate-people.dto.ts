/**
 * Generate People DTOs
 */

import { IsInt, IsOptional, IsString, Min } from 'class-validator';
import { GeneratedPeople, GenerationRequest } from '@fakehook/common/types';

export class GeneratePeopleDto implements GenerationRequest {
  @IsInt()
  @Min(1)
  @IsOptional()
  count?: number; // Default: DEFAULT_BATCH_SIZE, capped by MAX_BATCH_SIZE

  @IsInt()
  @Min(0)
  @IsOptional()
  seed?: number;

  @IsString()
  @IsOptional()
  locale?: string; // faker locale key, e.g. 'en', 'de', 'fr'
}

export type GeneratePeopleResponseDto = GeneratedPeople;
