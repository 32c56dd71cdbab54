import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  LOOKBACK_DAYS,
  LOCATION_TABLE,
  TIMESTAMP_COLUMN,
  LATITUDE_COLUMN,
  LONGITUDE_COLUMN,
} from '../../env';
import { ILocationFix } from '../../models';
import {
  TimelineError,
  describeError,
  errorStack,
  formatUtcDateTime,
} from '../../common';
import { createSqliteDataSource } from '../sqlite-data-source';

/**
 * Dónde están los datos dentro de la base SQLite
 */
export interface ILocationQueryOptions {
  table: string;
  timestampColumn: string; // epoch en milisegundos
  latitudeColumn: string; // grados decimales (no E7)
  longitudeColumn: string;
  lookbackDays: number; // 0 = toda la historia
}

export const DEFAULT_LOCATION_QUERY: Readonly<ILocationQueryOptions> = {
  table: LOCATION_TABLE,
  timestampColumn: TIMESTAMP_COLUMN,
  latitudeColumn: LATITUDE_COLUMN,
  longitudeColumn: LONGITUDE_COLUMN,
  lookbackDays: LOOKBACK_DAYS,
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

type RawRow = Record<string, unknown>;

const isRawRow = (value: unknown): value is RawRow =>
  typeof value === 'object' && value !== null;

/**
 * Location Source sobre archivos SQLite
 *
 * Extrae (timestamp, latitude, longitude) de la tabla configurada y filtra
 * las filas con campos null: el detector de stops asume input limpio.
 */
@Injectable()
export class LocationDatabaseService {
  private readonly logger = new Logger(LocationDatabaseService.name);

  /**
   * Extrae los fixes de una base SQLite
   *
   * Errores de SQLite se loguean y devuelven lista vacía (el caller
   * reporta "sin datos"). Identificadores inválidos lanzan TimelineError.
   */
  async parseLocationData(
    dbPath: string,
    overrides: Partial<ILocationQueryOptions> = {},
    now: Date = new Date(),
  ): Promise<ILocationFix[]> {
    const options: ILocationQueryOptions = { ...DEFAULT_LOCATION_QUERY, ...overrides };
    this.assertIdentifiers(options);

    const dataSource = createSqliteDataSource(dbPath, { readonly: true });

    try {
      await dataSource.initialize();

      if (!(await this.tableExists(dataSource, options.table))) {
        this.logger.error(
          `Error: Table '${options.table}' not found in database '${dbPath}'.`,
        );
        return [];
      }

      const rows = await this.queryRows(dataSource, options, now);
      const fixes: ILocationFix[] = [];

      for (const row of rows) {
        const fix = this.toLocationFix(row);
        if (fix) {
          fixes.push(fix);
        }
      }

      const skipped = rows.length - fixes.length;
      if (skipped > 0) {
        this.logger.warn(`Skipped ${skipped} rows with missing or invalid fields`);
      }

      this.logger.log(
        `Successfully extracted ${fixes.length} location points from '${dbPath}'.`,
      );
      return fixes;
    } catch (error) {
      this.logger.error(`SQLite Error: ${describeError(error)}`, errorStack(error));
      return [];
    } finally {
      if (dataSource.isInitialized) {
        await dataSource.destroy();
      }
    }
  }

  /**
   * Los nombres se interpolan en SQL: solo se aceptan identificadores simples
   */
  private assertIdentifiers(options: ILocationQueryOptions): void {
    const identifiers = [
      options.table,
      options.timestampColumn,
      options.latitudeColumn,
      options.longitudeColumn,
    ];

    for (const identifier of identifiers) {
      if (!IDENTIFIER_PATTERN.test(identifier)) {
        throw new TimelineError(
          'INVALID_CONFIGURATION',
          `Invalid SQL identifier in location query: '${identifier}'`,
        );
      }
    }
  }

  private async tableExists(dataSource: DataSource, table: string): Promise<boolean> {
    const columns: unknown = await dataSource.query(`PRAGMA table_info("${table}")`);
    return Array.isArray(columns) && columns.length > 0;
  }

  private async queryRows(
    dataSource: DataSource,
    options: ILocationQueryOptions,
    now: Date,
  ): Promise<RawRow[]> {
    const { table, timestampColumn, latitudeColumn, longitudeColumn, lookbackDays } =
      options;
    const params: number[] = [];

    let sql =
      `SELECT "${timestampColumn}" AS ts, "${latitudeColumn}" AS lat, ` +
      `"${longitudeColumn}" AS lon FROM "${table}"`;

    // Una ventana que llega antes del epoch equivale a toda la historia
    const sinceMs = now.getTime() - lookbackDays * MS_PER_DAY;

    if (lookbackDays > 0 && sinceMs > 0) {
      const since = new Date(sinceMs);
      sql += ` WHERE "${timestampColumn}" >= ?`;
      params.push(sinceMs);

      this.logger.log(
        `Querying database for location data from last ${lookbackDays} days...`,
      );
      this.logger.log(`Filtering data from: ${formatUtcDateTime(since)} UTC`);
    } else {
      this.logger.log('Querying database for the full location history...');
    }

    sql += ` ORDER BY "${timestampColumn}" ASC`;

    const result: unknown = await dataSource.query(sql, params);
    return Array.isArray(result) ? result.filter(isRawRow) : [];
  }

  /**
   * Convierte una fila cruda en fix; null si falta algún campo
   */
  private toLocationFix(row: RawRow): ILocationFix | null {
    const { ts, lat, lon } = row;

    if (typeof ts !== 'number' || typeof lat !== 'number' || typeof lon !== 'number') {
      return null;
    }
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return null;
    }

    const timestamp = new Date(ts);
    if (Number.isNaN(timestamp.getTime())) {
      return null;
    }

    return { timestamp, latitude: lat, longitude: lon };
  }
}
