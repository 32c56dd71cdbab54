export * from './adb-command.service';
export * from './adb-device.repository';
export * from './device-prompt.service';
export * from './device-extraction.service';
