import { Module } from '@nestjs/common';
import { AuxiliaresModule } from './auxiliares/auxiliares.module';
import { HealthModule } from './health/health.module';
import { DatabaseModule } from './database/database.module';
import { DetectionModule } from './detection/detection.module';
import { DeviceModule } from './device/device.module';
import { ReportsModule } from './reports/reports.module';
import { TimelineModule } from './timeline/timeline.module';

@Module({
  imports: [
    AuxiliaresModule,
    DatabaseModule,
    DetectionModule, // Stop detection
    DeviceModule, // Extracción vía adb
    ReportsModule, // timeline.csv, map.html, action_log.txt, hashes.csv
    TimelineModule,
    HealthModule,
  ],
})
export class AppModule {}
