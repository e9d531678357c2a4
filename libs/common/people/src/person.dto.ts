/**
 * Person DTO
 * Synthetic person record sent to webhooks
 */

import {
  IsEmail,
  IsISO8601,
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Person } from '@fakehook/common/types';

export class PersonDto implements Person {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  last_name!: string;

  @IsInt()
  @Min(0)
  @Max(120)
  age!: number;

  @Matches(/^\d{4}-\d{2}-\d{2}$/, {
    message: 'birth_date must be a calendar date (YYYY-MM-DD)',
  })
  @IsISO8601({ strict: true, strictSeparator: true })
  birth_date!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  address!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  phone!: string;

  @IsEmail()
  email!: string;
}
