import { Module } from '@nestjs/common';
import { DEVICE_REPOSITORY } from './device.constants';
import {
  AdbCommandService,
  AdbDeviceRepository,
  DevicePromptService,
  DeviceExtractionService,
} from './services';

@Module({
  providers: [
    AdbCommandService,
    DevicePromptService,
    DeviceExtractionService,
    {
      provide: DEVICE_REPOSITORY,
      useClass: AdbDeviceRepository,
    },
  ],
  exports: [AdbCommandService, DeviceExtractionService],
})
export class DeviceModule {}
