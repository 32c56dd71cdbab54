import { StopDurationBand } from '../../models';
import { DURATION_BAND_LIMITS } from '../reports.constants';

export const classifyStopDuration = (durationMinutes: number): StopDurationBand => {
  if (durationMinutes < DURATION_BAND_LIMITS.MEDIUM_FROM) return 'short';
  if (durationMinutes < DURATION_BAND_LIMITS.LONG_FROM) return 'medium';
  return 'long';
};
