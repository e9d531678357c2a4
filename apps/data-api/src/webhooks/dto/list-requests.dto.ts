/**
 * Captured Request DTOs
 */

import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { RequestSorting } from '@fakehook/common/types';

export class ListRequestsQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  page?: number;

  @IsIn(['newest', 'oldest'])
  @IsOptional()
  sorting?: RequestSorting;
}
