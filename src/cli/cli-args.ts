import { parseArgs } from 'util';
import { TimelineError, describeError, errorCode } from '../common';
import { PORT } from '../env';
import { IExtractionOptions } from '../timeline/interfaces';

export const DEFAULT_SAMPLE_DB_PATH = 'sample_data/locations.db';

export const USAGE = `Usage:
  location-timeline [extract] -o <dir> [--db-path <file>] [--device-id <id>]
                    [--days <n>] [--stop-radius <m>] [--min-duration <min>] [--max-gap <min>]
  location-timeline sample-db [--output <file>]
  location-timeline serve [--port <n>]

extract options:
  -o, --output <dir>       Directory for timeline.csv, map.html, hashes.csv and action_log.txt
  --db-path <file>         Local location database (skips the device pull)
  --device-id <id>         Device to pull from when several are connected
  --days <n>               Lookback window in days (0 reads the whole history)
  --stop-radius <m>        Maximum distance from the stop centroid, in meters
  --min-duration <min>     Minimum stop duration, in minutes
  --max-gap <min>          Maximum gap between consecutive fixes, in minutes`;

export type CliCommand =
  | { command: 'extract'; options: IExtractionOptions }
  | { command: 'sample-db'; output: string }
  | { command: 'serve'; port: number }
  | { command: 'help' };

const COMMANDS = ['extract', 'sample-db', 'serve'] as const;
type CommandName = (typeof COMMANDS)[number];

const isCommandName = (value: string): value is CommandName =>
  COMMANDS.some((command) => command === value);

const usageError = (message: string): TimelineError =>
  new TimelineError('INVALID_CONFIGURATION', message, 2);

/**
 * Número no negativo de un flag; con `integer` exige un entero
 */
const parseNumberFlag = (
  flag: string,
  raw: string | undefined,
  integer = false,
): number | undefined => {
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw usageError(`argument ${flag}: expected a non-negative number, got '${raw}'`);
  }
  if (integer && !Number.isInteger(value)) {
    throw usageError(`argument ${flag}: expected an integer, got '${raw}'`);
  }
  return value;
};

/**
 * Envuelve los errores de util.parseArgs (opción desconocida, valor faltante)
 */
const strictParse = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (error) {
    const code = errorCode(error);
    if (typeof code === 'string' && code.startsWith('ERR_PARSE_ARGS')) {
      throw usageError(describeError(error));
    }
    throw error;
  }
};

const parseExtract = (args: string[]): CliCommand => {
  const { values } = strictParse(() =>
    parseArgs({
      args,
      options: {
        output: { type: 'string', short: 'o' },
        'db-path': { type: 'string' },
        'device-id': { type: 'string' },
        days: { type: 'string' },
        'stop-radius': { type: 'string' },
        'min-duration': { type: 'string' },
        'max-gap': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }),
  );

  if (values.help) return { command: 'help' };
  if (!values.output) {
    throw usageError('the following argument is required: -o/--output');
  }

  const lookbackDays = parseNumberFlag('--days', values.days, true);

  return {
    command: 'extract',
    options: {
      outputDir: values.output,
      dbPath: values['db-path'],
      deviceId: values['device-id'],
      detection: {
        stopRadiusMeters: parseNumberFlag('--stop-radius', values['stop-radius']),
        minStopDurationMinutes: parseNumberFlag('--min-duration', values['min-duration']),
        maxTimeGapMinutes: parseNumberFlag('--max-gap', values['max-gap']),
      },
      query: lookbackDays === undefined ? {} : { lookbackDays },
    },
  };
};

const parseSampleDb = (args: string[]): CliCommand => {
  const { values } = strictParse(() =>
    parseArgs({
      args,
      options: {
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
      },
    }),
  );

  if (values.help) return { command: 'help' };
  return { command: 'sample-db', output: values.output ?? DEFAULT_SAMPLE_DB_PATH };
};

const parseServe = (args: string[]): CliCommand => {
  const { values } = strictParse(() =>
    parseArgs({
      args,
      options: {
        port: { type: 'string', short: 'p' },
        help: { type: 'boolean', short: 'h' },
      },
    }),
  );

  if (values.help) return { command: 'help' };
  return { command: 'serve', port: parseNumberFlag('--port', values.port, true) ?? PORT };
};

/**
 * Interpreta argv (sin `node` ni el script). Sin subcomando se asume `extract`.
 * Los argumentos inválidos lanzan TimelineError con exitCode 2.
 */
export const parseCliArgs = (argv: readonly string[]): CliCommand => {
  const [first, ...rest] = argv;
  const command: CommandName = first !== undefined && isCommandName(first) ? first : 'extract';
  const args = command === first ? rest : [...argv];

  switch (command) {
    case 'extract':
      return parseExtract(args);
    case 'sample-db':
      return parseSampleDb(args);
    case 'serve':
      return parseServe(args);
  }
};
