import { StopDurationBand } from '../../models';

/**
 * DTO de respuesta para stops
 */
export class StopResponseDto {
  /**
   * Timestamp del primer fix (ISO 8601)
   */
  arrivalTime!: string;

  /**
   * Timestamp del último fix (ISO 8601)
   */
  departureTime!: string;

  /**
   * Duración en minutos (truncada)
   */
  durationMinutes!: number;

  latitude!: number;
  longitude!: number;

  /**
   * Cantidad de fixes del stop
   */
  pointCount!: number;

  /**
   * Franja usada para colorear el mapa (short/medium/long)
   */
  durationBand!: StopDurationBand;
}
