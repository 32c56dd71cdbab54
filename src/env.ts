// Environment configuration
import * as dotenv from 'dotenv';

dotenv.config();

// Server
export const PORT = parseInt(process.env.PORT || '3001', 10);
export const NODE_ENV = process.env.NODE_ENV || 'development';

// Detección de stops
export const STOP_RADIUS_METERS = parseFloat(
  process.env.STOP_RADIUS_METERS || '50',
); // Radio máximo desde el centroide del cluster
export const MIN_STOP_DURATION_MINUTES = parseFloat(
  process.env.MIN_STOP_DURATION_MINUTES || '1',
);
export const MAX_TIME_GAP_MINUTES = parseFloat(
  process.env.MAX_TIME_GAP_MINUTES || '30',
); // Hueco máximo entre fixes consecutivos del mismo cluster

// Base de datos de ubicaciones (SQLite)
export const LOOKBACK_DAYS = parseInt(process.env.LOOKBACK_DAYS || '7', 10); // 0 = sin ventana
export const LOCATION_TABLE = process.env.LOCATION_TABLE || 'locations';
export const TIMESTAMP_COLUMN = process.env.TIMESTAMP_COLUMN || 'timestamp';
export const LATITUDE_COLUMN = process.env.LATITUDE_COLUMN || 'latitude';
export const LONGITUDE_COLUMN = process.env.LONGITUDE_COLUMN || 'longitude';
export const DB_LOGGING = process.env.DB_LOGGING === 'true';

// Device bridge
export const ADB_PATH = process.env.ADB_PATH || 'adb';
