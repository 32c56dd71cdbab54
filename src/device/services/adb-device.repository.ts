import { Injectable, Logger } from '@nestjs/common';
import { IDeviceRepository, IPullResult } from '../interfaces';
import {
  ADB_INACCESSIBLE_MARKERS,
  GMS_DATABASE_DIR,
  KNOWN_LOCATION_DATABASES,
} from '../device.constants';
import { AdbCommandService } from './adb-command.service';

/**
 * DeviceRepository sobre el Android Debug Bridge
 */
@Injectable()
export class AdbDeviceRepository implements IDeviceRepository {
  private readonly logger = new Logger(AdbDeviceRepository.name);

  constructor(private readonly adb: AdbCommandService) {}

  /**
   * Parsea `adb devices`: la primera línea es el encabezado y solo cuentan
   * los dispositivos en estado "device" (no offline/unauthorized)
   */
  async listDevices(): Promise<string[]> {
    const { stdout, stderr } = await this.adb.run(['devices']);

    if (stderr) {
      this.logger.error(`Error checking devices: ${stderr}`);
      return [];
    }

    return stdout
      .split(/\r?\n/)
      .slice(1)
      .filter((line) => line.includes('\tdevice'))
      .map((line) => line.split('\t')[0].trim());
  }

  /**
   * Bases conocidas primero; después cualquier otro *.db del directorio de
   * Play Services (best effort: sin root el listado suele fallar)
   */
  async listCandidateDatabases(deviceId: string): Promise<string[]> {
    const candidates: string[] = [...KNOWN_LOCATION_DATABASES];
    const listing = await this.adb.run(['-s', deviceId, 'shell', 'ls', GMS_DATABASE_DIR]);

    if (!listing.ok || listing.stderr) {
      this.logger.debug(
        `Could not list ${GMS_DATABASE_DIR} on ${deviceId}: ${listing.stderr}`,
      );
      return candidates;
    }

    for (const name of listing.stdout.split(/\s+/)) {
      const remotePath = `${GMS_DATABASE_DIR}/${name}`;
      if (name.endsWith('.db') && !candidates.includes(remotePath)) {
        candidates.push(remotePath);
      }
    }

    return candidates;
  }

  async pullFile(
    deviceId: string,
    remotePath: string,
    localPath: string,
  ): Promise<IPullResult> {
    const { stdout, stderr } = await this.adb.run([
      '-s',
      deviceId,
      'pull',
      remotePath,
      localPath,
    ]);

    if (ADB_INACCESSIBLE_MARKERS.some((marker) => stderr.includes(marker))) {
      return { pulled: false, reason: 'not_accessible', detail: stderr };
    }
    if (stderr) {
      return { pulled: false, reason: 'error', detail: stderr };
    }
    if (stdout.includes('pulled')) {
      return { pulled: true, detail: stdout };
    }

    return { pulled: false, reason: 'unexpected_output', detail: stdout };
  }
}
