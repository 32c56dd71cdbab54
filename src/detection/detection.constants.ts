import {
  STOP_RADIUS_METERS,
  MIN_STOP_DURATION_MINUTES,
  MAX_TIME_GAP_MINUTES,
} from '../env';
import { IStopDetectionConfig } from '../models';

/**
 * Radio medio de la Tierra en metros (esfera, no elipsoide)
 */
export const EARTH_RADIUS_M = 6371000;

/**
 * Umbrales por defecto, configurables por entorno
 */
export const DEFAULT_STOP_DETECTION_CONFIG: Readonly<IStopDetectionConfig> = {
  stopRadiusMeters: STOP_RADIUS_METERS,
  minStopDurationMinutes: MIN_STOP_DURATION_MINUTES,
  maxTimeGapMinutes: MAX_TIME_GAP_MINUTES,
};

export const MS_PER_MINUTE = 60 * 1000;
