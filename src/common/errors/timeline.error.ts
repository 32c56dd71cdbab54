/**
 * Códigos de falla de una corrida
 *
 * Todos son recuperables: el CLI los reporta y termina con exitCode.
 */
export type TimelineErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'OUTPUT_DIR_UNAVAILABLE'
  | 'DB_NOT_FOUND'
  | 'NO_DEVICE'
  | 'DEVICE_NOT_FOUND'
  | 'INVALID_SELECTION'
  | 'CANCELLED'
  | 'PULL_FAILED'
  | 'NO_LOCATION_DATA';

export class TimelineError extends Error {
  constructor(
    public readonly code: TimelineErrorCode,
    message: string,
    public readonly exitCode = 1,
  ) {
    super(message);
    this.name = 'TimelineError';
  }
}
