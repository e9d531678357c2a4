/**
 * Fakehook People Module
 * Fake person generation
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PeopleService } from './people.service';

@Module({
  imports: [ConfigModule],
  providers: [PeopleService],
  exports: [PeopleService],
})
export class PeopleModule {}
