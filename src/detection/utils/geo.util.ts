import { EARTH_RADIUS_M } from '../detection.constants';
import { ICoordinate } from '../../models';

const toRadians = (degrees: number): number => degrees * (Math.PI / 180);

/**
 * Distancia de gran círculo entre dos puntos GPS (fórmula de Haversine)
 *
 * Usa la forma con atan2, estable para puntos coincidentes y antipodales.
 *
 * @returns distancia en metros
 */
export const haversineDistance = (
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number => {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_M * c;
};

/**
 * Centroide aritmético (promedio de latitudes y longitudes por separado)
 *
 * No es un centroide esférico: a escala de un stop (decenas de metros)
 * la diferencia es despreciable. Lista vacía => (0, 0).
 */
export const calculateCentroid = (points: readonly ICoordinate[]): ICoordinate => {
  if (points.length === 0) {
    return { latitude: 0, longitude: 0 };
  }

  let latSum = 0;
  let lonSum = 0;
  for (const point of points) {
    latSum += point.latitude;
    lonSum += point.longitude;
  }

  return {
    latitude: latSum / points.length,
    longitude: lonSum / points.length,
  };
};

/**
 * Redondea a una cantidad fija de decimales
 */
export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};
