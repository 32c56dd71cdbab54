import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { LocationRecord } from '../entities';
import { createSqliteDataSource } from '../sqlite-data-source';
import { errorCode } from '../../common';
import sampleLocations from '../data/sample-locations.json';

export interface ISampleLocation {
  daysAgo: number;
  hour: number; // hora local
  minute: number;
  latitude: number;
  longitude: number;
  accuracy: number;
  altitude: number;
  speed: number;
  bearing: number;
  provider: string;
}

export interface ISampleDatabaseSummary {
  path: string;
  totalRecords: number;
  firstTimestamp: Date | null;
  lastTimestamp: Date | null;
}

/**
 * Genera una base SQLite de ejemplo con el esquema de ubicaciones de Android
 *
 * Los timestamps son relativos a `now` (días atrás + hora local), así la
 * ventana de los últimos 7 días siempre tiene datos.
 */
@Injectable()
export class SampleDatabaseService {
  private readonly logger = new Logger(SampleDatabaseService.name);

  async createSampleDatabase(
    dbPath: string,
    now: Date = new Date(),
    samples: readonly ISampleLocation[] = sampleLocations,
  ): Promise<ISampleDatabaseSummary> {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });

    try {
      await fs.rm(dbPath);
      this.logger.log(`Existing ${dbPath} removed.`);
    } catch (error) {
      if (!this.isMissingFile(error)) {
        throw error;
      }
    }

    const dataSource = createSqliteDataSource(dbPath, {
      entities: [LocationRecord],
      synchronize: true,
    });
    await dataSource.initialize();

    try {
      const repository = dataSource.getRepository(LocationRecord);

      this.logger.log('Inserting location data...');
      const records = samples.map((sample) =>
        repository.create({
          timestamp: this.relativeTimestamp(now, sample),
          latitude: sample.latitude,
          longitude: sample.longitude,
          accuracy: sample.accuracy,
          altitude: sample.altitude,
          speed: sample.speed,
          bearing: sample.bearing,
          provider: sample.provider,
        }),
      );
      await repository.save(records);

      const timestamps = records.map((record) => record.timestamp);
      const summary: ISampleDatabaseSummary = {
        path: path.resolve(dbPath),
        totalRecords: await repository.count(),
        firstTimestamp: timestamps.length > 0 ? new Date(Math.min(...timestamps)) : null,
        lastTimestamp: timestamps.length > 0 ? new Date(Math.max(...timestamps)) : null,
      };

      this.logger.log(
        `Sample database created at ${summary.path} with ${summary.totalRecords} records`,
      );
      return summary;
    } finally {
      await dataSource.destroy();
    }
  }

  /**
   * `now` menos N días, con la hora local fijada (segundos y ms en 0)
   */
  private relativeTimestamp(now: Date, sample: ISampleLocation): number {
    const date = new Date(now.getTime());
    date.setDate(date.getDate() - sample.daysAgo);
    date.setHours(sample.hour, sample.minute, 0, 0);
    return date.getTime();
  }

  private isMissingFile(error: unknown): boolean {
    return errorCode(error) === 'ENOENT';
  }
}
