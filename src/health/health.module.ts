import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DetectionModule } from '../detection/detection.module';
import { DeviceModule } from '../device/device.module';

@Module({
  imports: [DeviceModule, DetectionModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
