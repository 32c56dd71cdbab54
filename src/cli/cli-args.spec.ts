import { TimelineError } from '../common';
import { DEFAULT_SAMPLE_DB_PATH, parseCliArgs } from './cli-args';

const expectUsageError = (argv: string[]): void => {
  let caught: unknown;
  try {
    parseCliArgs(argv);
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(TimelineError);
  expect(caught).toMatchObject({ code: 'INVALID_CONFIGURATION', exitCode: 2 });
};

describe('parseCliArgs', () => {
  it('defaults to extract when no command is given', () => {
    expect(parseCliArgs(['-o', 'out', '--db-path', 'sample_data/locations.db'])).toEqual({
      command: 'extract',
      options: {
        outputDir: 'out',
        dbPath: 'sample_data/locations.db',
        deviceId: undefined,
        detection: {
          stopRadiusMeters: undefined,
          minStopDurationMinutes: undefined,
          maxTimeGapMinutes: undefined,
        },
        query: {},
      },
    });
  });

  it('reads detection thresholds and the lookback window', () => {
    const parsed = parseCliArgs([
      'extract',
      '--output=out',
      '--device-id',
      'emulator-5554',
      '--days',
      '0',
      '--stop-radius',
      '75.5',
      '--min-duration',
      '5',
      '--max-gap',
      '15',
    ]);

    expect(parsed).toEqual({
      command: 'extract',
      options: {
        outputDir: 'out',
        dbPath: undefined,
        deviceId: 'emulator-5554',
        detection: {
          stopRadiusMeters: 75.5,
          minStopDurationMinutes: 5,
          maxTimeGapMinutes: 15,
        },
        query: { lookbackDays: 0 },
      },
    });
  });

  it('requires an output directory for extract', () => {
    expectUsageError(['--db-path', 'locations.db']);
  });

  it.each([
    [['-o', 'out', '--stop-radius', 'far']],
    [['-o', 'out', '--max-gap', '-1']],
    [['-o', 'out', '--days', '1.5']],
    [['-o', 'out', '--unknown']],
    [['-o', 'out', 'stray']],
    [['serve', '--port', 'http']],
  ])('rejects invalid arguments %j', (argv) => {
    expectUsageError(argv);
  });

  it('uses the default sample database path', () => {
    expect(parseCliArgs(['sample-db'])).toEqual({
      command: 'sample-db',
      output: DEFAULT_SAMPLE_DB_PATH,
    });
    expect(parseCliArgs(['sample-db', '--output', 'tmp/test.db'])).toEqual({
      command: 'sample-db',
      output: 'tmp/test.db',
    });
  });

  it('parses the serve port', () => {
    expect(parseCliArgs(['serve', '--port', '8080'])).toEqual({ command: 'serve', port: 8080 });
    expect(parseCliArgs(['serve'])).toEqual({ command: 'serve', port: 3001 });
  });

  it('returns help for -h on any command', () => {
    expect(parseCliArgs(['-h'])).toEqual({ command: 'help' });
    expect(parseCliArgs(['serve', '--help'])).toEqual({ command: 'help' });
  });
});
