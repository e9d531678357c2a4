/**
 * People Controller
 * Fake person generation endpoint
 */

import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { PeopleService } from '@fakehook/common/people';
import {
  GeneratePeopleDto,
  GeneratePeopleResponseDto,
} from './dto/generate-people.dto';

@Controller('api/people')
export class PeopleController {
  constructor(private peopleService: PeopleService) {}

  /**
   * POST /api/people/generate
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  generate(@Body() dto: GeneratePeopleDto): GeneratePeopleResponseDto {
    return this.peopleService.generate(dto);
  }
}
