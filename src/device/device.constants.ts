/**
 * Token de inyección del DeviceRepository
 */
export const DEVICE_REPOSITORY = 'DEVICE_REPOSITORY';

/**
 * Directorio de bases de Google Play Services en el dispositivo
 */
export const GMS_DATABASE_DIR = '/data/data/com.google.android.gms/databases';

/**
 * Bases conocidas con historial de ubicaciones, en orden de preferencia
 */
export const KNOWN_LOCATION_DATABASES = [
  `${GMS_DATABASE_DIR}/locations.db`,
  `${GMS_DATABASE_DIR}/cache.db`,
] as const;

/**
 * Fragmentos de stderr de `adb pull` que indican ruta inaccesible
 */
export const ADB_INACCESSIBLE_MARKERS = [
  'Permission denied',
  'failed to stat',
  'No such file or directory',
] as const;
