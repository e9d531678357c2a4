/**
 * People API Module
 */

import { Module } from '@nestjs/common';
import { PeopleModule } from '@fakehook/common/people';
import { PeopleController } from './people.controller';

@Module({
  imports: [PeopleModule],
  controllers: [PeopleController],
})
export class PeopleApiModule {}
