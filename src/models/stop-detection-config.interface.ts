/**
 * Umbrales del detector de stops
 */
export interface IStopDetectionConfig {
  /**
   * Distancia máxima (metros) entre el centroide del cluster y un fix nuevo
   */
  stopRadiusMeters: number;

  /**
   * Duración mínima (minutos) para emitir un cluster como stop
   */
  minStopDurationMinutes: number;

  /**
   * Tiempo máximo (minutos) desde el último fix del cluster
   */
  maxTimeGapMinutes: number;
}
