import { StopDurationBand } from '../models';

export const TIMELINE_FILENAME = 'timeline.csv';
export const MAP_FILENAME = 'map.html';
export const ACTION_LOG_FILENAME = 'action_log.txt';
export const HASHES_FILENAME = 'hashes.csv';

export const TIMELINE_COLUMNS = [
  'arrival_time',
  'departure_time',
  'duration_minutes',
  'latitude',
  'longitude',
  'point_count',
] as const;

export const HASHES_COLUMNS = ['filename', 'sha256_hash'] as const;

/**
 * Límites de las franjas de duración (minutos)
 * short < 30 <= medium < 120 <= long
 */
export const DURATION_BAND_LIMITS = {
  MEDIUM_FROM: 30,
  LONG_FROM: 120,
} as const;

export const DURATION_BAND_COLORS: Record<StopDurationBand, string> = {
  short: 'green',
  medium: 'orange',
  long: 'red',
};

/**
 * Configuración del mapa
 */
export const MAP_CONFIG = {
  // Centro por defecto cuando no hay stops (San Francisco)
  DEFAULT_CENTER: [37.7749, -122.4194] as const,
  ZOOM: 12,
  POPUP_MAX_WIDTH: 300,
  HEAT_RADIUS: 15,
  HEAT_BLUR: 10,
  LEAFLET_VERSION: '1.9.4',
  LEAFLET_HEAT_VERSION: '0.2.0',
} as const;
