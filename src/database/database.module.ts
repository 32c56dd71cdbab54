import { Module } from '@nestjs/common';
import { LocationDatabaseService, SampleDatabaseService } from './services';

@Module({
  providers: [LocationDatabaseService, SampleDatabaseService],
  exports: [LocationDatabaseService, SampleDatabaseService],
})
export class DatabaseModule {}
