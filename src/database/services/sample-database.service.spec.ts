import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createSqliteDataSource } from '../sqlite-data-source';
import { ISampleLocation, SampleDatabaseService } from './sample-database.service';

const NOW = new Date(2024, 5, 1, 12, 0, 0);

const sample = (daysAgo: number, hour: number, minute: number): ISampleLocation => ({
  daysAgo,
  hour,
  minute,
  latitude: 40.4168,
  longitude: -3.7038,
  accuracy: 10,
  altitude: 650,
  speed: 0,
  bearing: 0,
  provider: 'gps',
});

describe('SampleDatabaseService', () => {
  let service: SampleDatabaseService;
  let workDir: string;

  beforeEach(async () => {
    service = new SampleDatabaseService();
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sample-db-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  const countRows = async (dbPath: string): Promise<unknown> => {
    const dataSource = createSqliteDataSource(dbPath, { readonly: true });
    await dataSource.initialize();
    try {
      return await dataSource.query('SELECT COUNT(*) AS total FROM locations');
    } finally {
      await dataSource.destroy();
    }
  };

  it('creates a database at a path that does not exist yet', async () => {
    const dbPath = path.join(workDir, 'nested', 'dir', 'locations.db');

    const summary = await service.createSampleDatabase(dbPath, NOW);

    expect(summary.path).toBe(path.resolve(dbPath));
    expect(summary.totalRecords).toBe(29);
    await expect(countRows(dbPath)).resolves.toEqual([{ total: 29 }]);
  });

  it('replaces an existing file', async () => {
    const dbPath = path.join(workDir, 'locations.db');
    await fs.writeFile(dbPath, 'not a database');

    const summary = await service.createSampleDatabase(dbPath, NOW, [sample(1, 8, 30)]);

    expect(summary.totalRecords).toBe(1);
    await expect(countRows(dbPath)).resolves.toEqual([{ total: 1 }]);
  });

  it('places samples relative to now in local time', async () => {
    const summary = await service.createSampleDatabase(
      path.join(workDir, 'locations.db'),
      NOW,
      [sample(0, 9, 15), sample(2, 18, 45)],
    );

    expect(summary.firstTimestamp).toEqual(new Date(2024, 4, 30, 18, 45, 0));
    expect(summary.lastTimestamp).toEqual(new Date(2024, 5, 1, 9, 15, 0));
  });
});
