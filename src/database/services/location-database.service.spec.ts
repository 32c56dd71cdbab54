import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TimelineError } from '../../common';
import { createSqliteDataSource } from '../sqlite-data-source';
import { LocationDatabaseService } from './location-database.service';
import { SampleDatabaseService } from './sample-database.service';

const NOW = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));
const HOUR = 60 * 60 * 1000;

describe('LocationDatabaseService', () => {
  let service: LocationDatabaseService;
  let workDir: string;

  beforeEach(async () => {
    service = new LocationDatabaseService();
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'location-db-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  const createDatabase = async (file: string, statements: string[]): Promise<string> => {
    const dbPath = path.join(workDir, file);
    const dataSource = createSqliteDataSource(dbPath);
    await dataSource.initialize();
    for (const statement of statements) {
      await dataSource.query(statement);
    }
    await dataSource.destroy();
    return dbPath;
  };

  it('reads every row of the sample database when the window is disabled', async () => {
    const dbPath = path.join(workDir, 'sample', 'locations.db');
    const summary = await new SampleDatabaseService().createSampleDatabase(dbPath, NOW);

    const fixes = await service.parseLocationData(dbPath, { lookbackDays: 0 }, NOW);

    expect(summary.totalRecords).toBe(29);
    expect(fixes).toHaveLength(29);
    expect(fixes[0].latitude).toBe(37.7749);
    expect(fixes[0].longitude).toBe(-122.4194);
    expect(fixes[0].timestamp.getTime()).toBe(summary.firstTimestamp?.getTime());
    for (let i = 1; i < fixes.length; i++) {
      expect(fixes[i].timestamp.getTime()).toBeGreaterThanOrEqual(
        fixes[i - 1].timestamp.getTime(),
      );
    }
  });

  it('reads the full history when the window reaches before the epoch', async () => {
    const dbPath = path.join(workDir, 'sample', 'locations.db');
    await new SampleDatabaseService().createSampleDatabase(dbPath, NOW);

    const fixes = await service.parseLocationData(dbPath, { lookbackDays: 200_000_000 }, NOW);

    expect(fixes).toHaveLength(29);
  });

  it('applies the lookback window and drops rows with null fields', async () => {
    const now = NOW.getTime();
    const dbPath = await createDatabase('custom.db', [
      'CREATE TABLE gps_log (ts INTEGER, lat REAL, lon REAL)',
      `INSERT INTO gps_log VALUES (${now - 30 * 60 * 1000}, 40.4168, -3.7038)`,
      `INSERT INTO gps_log VALUES (${now - HOUR}, 40.4167, -3.7037)`,
      `INSERT INTO gps_log VALUES (${now - 2 * HOUR}, NULL, -3.7)`,
      `INSERT INTO gps_log VALUES (${now - 10 * 24 * HOUR}, 41.3874, 2.1686)`,
    ]);

    const fixes = await service.parseLocationData(
      dbPath,
      {
        table: 'gps_log',
        timestampColumn: 'ts',
        latitudeColumn: 'lat',
        longitudeColumn: 'lon',
        lookbackDays: 7,
      },
      NOW,
    );

    expect(fixes).toEqual([
      { timestamp: new Date(now - HOUR), latitude: 40.4167, longitude: -3.7037 },
      { timestamp: new Date(now - 30 * 60 * 1000), latitude: 40.4168, longitude: -3.7038 },
    ]);
  });

  it('returns an empty list when the table does not exist', async () => {
    const dbPath = await createDatabase('other.db', [
      'CREATE TABLE something_else (id INTEGER)',
    ]);

    await expect(service.parseLocationData(dbPath, {}, NOW)).resolves.toEqual([]);
  });

  it('returns an empty list when the file does not exist', async () => {
    await expect(
      service.parseLocationData(path.join(workDir, 'missing.db'), {}, NOW),
    ).resolves.toEqual([]);
  });

  it('rejects table names that are not plain identifiers', async () => {
    const dbPath = await createDatabase('any.db', ['CREATE TABLE locations (id INTEGER)']);

    const result = service.parseLocationData(dbPath, { table: 'locations; DROP TABLE x' });

    await expect(result).rejects.toBeInstanceOf(TimelineError);
    await expect(result).rejects.toMatchObject({ code: 'INVALID_CONFIGURATION' });
  });
});
