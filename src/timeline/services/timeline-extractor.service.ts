import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ActionLogService } from '../../auxiliares/logger/action-log.service';
import { TimelineError, describeError } from '../../common';
import {
  DEFAULT_LOCATION_QUERY,
  LocationDatabaseService,
} from '../../database/services';
import { StopDetectorService } from '../../detection/services';
import { DeviceExtractionService } from '../../device/services';
import { ReportGeneratorService } from '../../reports/services';
import { IExtractionOptions, IExtractionResult } from '../interfaces';

/**
 * Orquesta una corrida completa
 *
 * 1. Directorio de salida
 * 2. Base de ubicaciones (archivo local o extraída del dispositivo)
 * 3. Parseo de fixes
 * 4. Detección de stops
 * 5. Artefactos (se generan aunque no haya stops)
 *
 * Las fallas que cortan la corrida se lanzan como TimelineError.
 * El action log acumula entradas solo mientras dura run().
 */
@Injectable()
export class TimelineExtractorService {
  private readonly logger = new Logger(TimelineExtractorService.name);

  constructor(
    private readonly locationDatabase: LocationDatabaseService,
    private readonly deviceExtraction: DeviceExtractionService,
    private readonly stopDetector: StopDetectorService,
    private readonly reportGenerator: ReportGeneratorService,
    private readonly actionLog: ActionLogService,
  ) {}

  async run(options: IExtractionOptions): Promise<IExtractionResult> {
    this.actionLog.startRun();
    try {
      return await this.extract(options);
    } finally {
      this.actionLog.stopRun();
    }
  }

  private async extract(options: IExtractionOptions): Promise<IExtractionResult> {
    this.logger.log('Location Timeline Extractor started');
    if (options.commandLine) {
      this.logger.log(`Command line arguments: ${options.commandLine}`);
    }

    await this.setupOutputDirectory(options.outputDir);

    // Fase 1: obtener la base
    const databasePath = await this.resolveDatabase(options);
    this.logger.log(`Location database ready at: ${databasePath}`);

    // Fase 2: parsear
    const query = { ...DEFAULT_LOCATION_QUERY, ...options.query };
    this.logger.log('Starting database parsing...');
    this.logger.log(
      `DB Config: Table='${query.table}', Timestamp='${query.timestampColumn}', ` +
        `Lat='${query.latitudeColumn}', Lon='${query.longitudeColumn}'`,
    );

    const fixes = await this.locationDatabase.parseLocationData(databasePath, query);
    if (fixes.length === 0) {
      throw new TimelineError(
        'NO_LOCATION_DATA',
        'No location data extracted or an error occurred during parsing.',
      );
    }
    this.logger.log(`Successfully parsed ${fixes.length} location points.`);

    // Fase 3: detectar stops
    this.logger.log('Starting location analysis...');
    const config = this.stopDetector.resolveConfig(options.detection);
    this.logger.log(
      `Stop thresholds: radius=${config.stopRadiusMeters}m, ` +
        `minDuration=${config.minStopDurationMinutes}min, maxGap=${config.maxTimeGapMinutes}min`,
    );

    const stops = this.stopDetector.detectStops(fixes, config);
    this.logger.log(
      `Analyzed ${fixes.length} location points and found ${stops.length} stops.`,
    );
    if (stops.length === 0) {
      this.logger.warn('No stops identified in the location data.');
    } else {
      this.logger.log(`Identified ${stops.length} stops from location data.`);
    }

    // Fase 4: artefactos
    this.logger.log('Starting output generation...');
    const artifacts = await this.reportGenerator.generateAllOutputs(stops, options.outputDir);

    this.logger.log('Location Timeline Extractor completed successfully!');
    this.logger.log(`All outputs saved to: ${path.resolve(options.outputDir)}`);

    return { databasePath, fixCount: fixes.length, stops, artifacts };
  }

  private async setupOutputDirectory(outputDir: string): Promise<void> {
    try {
      await fs.mkdir(outputDir, { recursive: true });
      this.logger.log(`Output directory '${outputDir}' ensured.`);
    } catch (error) {
      throw new TimelineError(
        'OUTPUT_DIR_UNAVAILABLE',
        `Could not create output directory '${outputDir}'. ${describeError(error)}`,
      );
    }
  }

  private async resolveDatabase(options: IExtractionOptions): Promise<string> {
    if (options.dbPath) {
      try {
        await fs.access(options.dbPath);
      } catch {
        throw new TimelineError(
          'DB_NOT_FOUND',
          `Specified DB path '${options.dbPath}' does not exist.`,
        );
      }

      this.logger.log(`Using provided local DB path: '${options.dbPath}'`);
      return options.dbPath;
    }

    const devices = await this.deviceExtraction.listConnectedDevices();
    const deviceId = await this.deviceExtraction.selectDevice(devices, options.deviceId);

    const pulledPath = await this.deviceExtraction.pullLocationDatabase(
      deviceId,
      options.outputDir,
    );
    if (!pulledPath) {
      throw new TimelineError('PULL_FAILED', `Failed to pull DB from '${deviceId}'.`);
    }

    return pulledPath;
  }
}
