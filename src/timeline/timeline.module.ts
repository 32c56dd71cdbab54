import { Module } from '@nestjs/common';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import { DatabaseModule } from '../database/database.module';
import { DetectionModule } from '../detection/detection.module';
import { DeviceModule } from '../device/device.module';
import { ReportsModule } from '../reports/reports.module';
import { TimelineExtractorService } from './services';
import { TimelineController } from './timeline.controller';

/**
 * Orquestación de una corrida (CLI) y API de detección
 */
@Module({
  imports: [AuxiliaresModule, DatabaseModule, DeviceModule, DetectionModule, ReportsModule],
  controllers: [TimelineController],
  providers: [TimelineExtractorService],
  exports: [TimelineExtractorService],
})
export class TimelineModule {}
