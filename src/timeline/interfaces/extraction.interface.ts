import { IStop, IStopDetectionConfig } from '../../models';
import { ILocationQueryOptions } from '../../database/services';
import { IReportArtifacts } from '../../reports/services';

/**
 * Parámetros de una corrida de extracción
 */
export interface IExtractionOptions {
  outputDir: string;

  /**
   * Base local; si no se indica se extrae del dispositivo
   */
  dbPath?: string;
  deviceId?: string;

  /**
   * Línea de comando original, solo para el action log
   */
  commandLine?: string;

  detection?: Partial<IStopDetectionConfig>;
  query?: Partial<ILocationQueryOptions>;
}

export interface IExtractionResult {
  databasePath: string;
  fixCount: number;
  stops: IStop[];
  artifacts: IReportArtifacts;
}
