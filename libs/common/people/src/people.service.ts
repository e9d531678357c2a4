/**
 * Fakehook People Service
 * Generates and validates batches of person records
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { validateSync } from 'class-validator';
import { ERRORS } from '@fakehook/common/errors';
import { GeneratedPeople, GenerationRequest } from '@fakehook/common/types';
import { PersonDto } from './person.dto';
import { PersonFactory } from './person.factory';
import { describeValidationErrors } from './person-validation';

@Injectable()
export class PeopleService {
  private readonly logger = new Logger(PeopleService.name);
  private readonly defaultBatchSize: number;
  private readonly maxBatchSize: number;
  private readonly defaultLocale: string;
  private readonly defaultSeed?: number;

  constructor(private configService: ConfigService) {
    this.defaultBatchSize = this.configService.get<number>('defaultBatchSize', 10);
    this.maxBatchSize = this.configService.get<number>('maxBatchSize', 1000);
    this.defaultLocale = this.configService.get<string>('fakerLocale', 'en');
    this.defaultSeed = this.configService.get<number>('fakerSeed');
  }

  /**
   * Generate a batch of people
   * Falls back to the configured batch size, locale and seed
   */
  generate(request: GenerationRequest, referenceDate?: Date): GeneratedPeople {
    const count = request.count ?? this.defaultBatchSize;
    const locale = request.locale ?? this.defaultLocale;
    const seed = request.seed ?? this.defaultSeed;

    if (count < 1 || count > this.maxBatchSize) {
      throw ERRORS.ValidationError(
        `count must be between 1 and ${this.maxBatchSize}`,
        'count',
      );
    }

    const people = PersonFactory.createMany(count, {
      seed,
      locale,
      referenceDate,
    });
    people.forEach((person, index) => this.assertValid(person, index));

    this.logger.log(
      `Generated ${count} people (locale=${locale}, seed=${seed ?? 'random'})`,
    );

    return {
      seed: seed ?? null,
      locale,
      count,
      people,
    };
  }

  private assertValid(person: PersonDto, index: number): void {
    const errors = validateSync(person);
    if (errors.length > 0) {
      throw ERRORS.GenerationFailed(describeValidationErrors(errors), {
        index,
      });
    }
  }
}
