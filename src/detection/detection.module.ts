import { Module } from '@nestjs/common';
import { StopDetectorService } from './services';

@Module({
  providers: [StopDetectorService],
  exports: [StopDetectorService],
})
export class DetectionModule {}
