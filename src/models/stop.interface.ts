/**
 * Stop detectado: permanencia contigua en un mismo lugar
 */
export interface IStop {
  // Tiempo
  readonly arrivalTime: Date; // timestamp del primer fix del cluster
  readonly departureTime: Date; // timestamp del último fix del cluster
  readonly durationMinutes: number; // truncado, no redondeado

  // Ubicación (centroide aritmético, 6 decimales)
  readonly latitude: number;
  readonly longitude: number;

  // Cantidad de fixes que forman el stop (>= 1)
  readonly pointCount: number;
}

/**
 * Franja de duración usada por el mapa
 */
export type StopDurationBand = 'short' | 'medium' | 'long';
