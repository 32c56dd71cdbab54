import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { TimelineError } from '../../common';
import { DEVICE_REPOSITORY } from '../device.constants';
import { IDeviceRepository } from '../interfaces';
import { DevicePromptService } from './device-prompt.service';

/**
 * Obtiene la base de ubicaciones desde un dispositivo conectado
 *
 * - Lista y selecciona el dispositivo
 * - Prueba cada base candidata hasta que una se copie
 * - Limpia archivos parciales de intentos fallidos
 */
@Injectable()
export class DeviceExtractionService {
  private readonly logger = new Logger(DeviceExtractionService.name);

  constructor(
    @Inject(DEVICE_REPOSITORY)
    private readonly devices: IDeviceRepository,
    private readonly prompt: DevicePromptService,
  ) {}

  async listConnectedDevices(): Promise<string[]> {
    this.logger.log('Checking for connected ADB devices...');
    const devices = await this.devices.listDevices();

    if (devices.length > 0) {
      this.logger.log(`Found ${devices.length} device(s): ${devices.join(', ')}`);
    } else {
      this.logger.warn(
        'No ADB devices found. Ensure device is connected and USB debugging is enabled.',
      );
    }

    return devices;
  }

  /**
   * Elige el dispositivo de trabajo
   *
   * 1. Si se pidió uno explícito, debe estar conectado
   * 2. Si hay uno solo, se usa ese
   * 3. Si hay varios, se pregunta (número de la lista o ID)
   */
  async selectDevice(devices: readonly string[], requestedId?: string): Promise<string> {
    if (devices.length === 0) {
      throw new TimelineError(
        'NO_DEVICE',
        'No devices found to pull from. Please connect an ADB-enabled device or provide a --db-path.',
      );
    }

    if (requestedId) {
      if (!devices.includes(requestedId)) {
        throw new TimelineError(
          'DEVICE_NOT_FOUND',
          `Specified device ID '${requestedId}' not found among connected devices.`,
        );
      }
      return requestedId;
    }

    if (devices.length === 1) {
      return devices[0];
    }

    this.logger.log('Multiple devices found. Please select one:');
    const answer = await this.prompt.askForDevice(devices);

    if (answer === null) {
      throw new TimelineError('CANCELLED', 'Operation cancelled by user.');
    }

    if (/^\d+$/.test(answer)) {
      const index = parseInt(answer, 10);
      if (index >= 1 && index <= devices.length) {
        return devices[index - 1];
      }
    }
    if (devices.includes(answer)) {
      return answer;
    }

    throw new TimelineError('INVALID_SELECTION', 'Invalid choice. Exiting.');
  }

  /**
   * Copia la primera base candidata accesible a outputDir
   *
   * @returns ruta local del archivo copiado, o null si ninguna funcionó
   */
  async pullLocationDatabase(deviceId: string, outputDir: string): Promise<string | null> {
    this.logger.log(`Attempting to pull location database from device '${deviceId}'...`);

    const candidates = await this.devices.listCandidateDatabases(deviceId);

    for (const remotePath of candidates) {
      const localPath = path.join(outputDir, path.posix.basename(remotePath));

      this.logger.log(`Trying to pull '${remotePath}' to '${localPath}'...`);
      const result = await this.devices.pullFile(deviceId, remotePath, localPath);

      if (result.pulled) {
        this.logger.log(`Successfully pulled '${remotePath}' to '${localPath}'`);
        return localPath;
      }

      if (result.reason === 'not_accessible') {
        this.logger.warn(
          `Permission denied or path not found for '${remotePath}'. Error: ${result.detail}. Trying next path...`,
        );
      } else {
        this.logger.warn(
          `ADB pull error for '${remotePath}': ${result.detail || 'no confirmation from adb'}. Trying next path...`,
        );
      }

      // Un pull fallido puede dejar un archivo parcial
      await fs.rm(localPath, { force: true });
    }

    this.logger.error(
      `Failed to pull location database from device '${deviceId}' using any common path.`,
    );
    this.logger.log(
      'TIP: If your phone is not rooted, you may need to use an emulator or a publicly available SQLite location DB.',
    );
    return null;
  }
}
