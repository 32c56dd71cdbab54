/**
 * Observación GPS individual tal como la entrega el Location Source
 *
 * Precondición del detector: timestamp y coordenadas nunca son null
 * (el filtrado ocurre antes, en LocationDatabaseService).
 */
export interface ILocationFix {
  /**
   * Instante UTC de la observación (precisión de milisegundos)
   */
  readonly timestamp: Date;

  /**
   * Latitud en grados decimales (WGS-84, no se valida el rango)
   */
  readonly latitude: number;

  /**
   * Longitud en grados decimales (WGS-84, no se valida el rango)
   */
  readonly longitude: number;
}

export interface ICoordinate {
  latitude: number;
  longitude: number;
}
