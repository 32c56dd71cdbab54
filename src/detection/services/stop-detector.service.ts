import { Injectable } from '@nestjs/common';
import { ILocationFix, IStop, IStopDetectionConfig } from '../../models';
import {
  DEFAULT_STOP_DETECTION_CONFIG,
  MS_PER_MINUTE,
} from '../detection.constants';
import { calculateCentroid, haversineDistance, roundTo } from '../utils/geo.util';

/**
 * Detector de stops
 *
 * Recorre una sola vez la secuencia de fixes (ordenada por timestamp) y agrupa
 * fixes contiguos en clusters:
 * - Un fix se une al cluster actual si está a <= stopRadiusMeters del centroide
 *   del cluster Y llegó <= maxTimeGapMinutes después del ÚLTIMO fix del cluster
 * - Si no, el cluster se cierra y se abre uno nuevo con ese fix
 * - Un cluster cerrado se emite como stop solo si su duración alcanza
 *   minStopDurationMinutes; si no, se descarta completo (sin merge)
 *
 * Es una función pura: sin logging, sin I/O, sin estado entre llamadas.
 * Los callers distinguen "sin fixes" de "sin stops" en sus propios logs.
 */
@Injectable()
export class StopDetectorService {
  /**
   * Configuración efectiva para una llamada
   */
  resolveConfig(overrides?: Partial<IStopDetectionConfig>): IStopDetectionConfig {
    return {
      stopRadiusMeters:
        overrides?.stopRadiusMeters ?? DEFAULT_STOP_DETECTION_CONFIG.stopRadiusMeters,
      minStopDurationMinutes:
        overrides?.minStopDurationMinutes ??
        DEFAULT_STOP_DETECTION_CONFIG.minStopDurationMinutes,
      maxTimeGapMinutes:
        overrides?.maxTimeGapMinutes ?? DEFAULT_STOP_DETECTION_CONFIG.maxTimeGapMinutes,
    };
  }

  /**
   * Convierte una secuencia de fixes en stops
   *
   * El input no necesita venir ordenado (se ordena una copia, sort estable)
   * y no se modifica.
   */
  detectStops(
    fixes: readonly ILocationFix[],
    overrides?: Partial<IStopDetectionConfig>,
  ): IStop[] {
    if (fixes.length === 0) {
      return [];
    }

    const config = this.resolveConfig(overrides);
    const sorted = [...fixes].sort(
      (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
    );

    const stops: IStop[] = [];
    let cluster: ILocationFix[] = [sorted[0]];

    for (const fix of sorted.slice(1)) {
      const lastMember = cluster[cluster.length - 1];
      const timeDiff =
        (fix.timestamp.getTime() - lastMember.timestamp.getTime()) / MS_PER_MINUTE;

      // Centroide ANTES de agregar el fix
      const center = calculateCentroid(cluster);
      const distance = haversineDistance(
        center.latitude,
        center.longitude,
        fix.latitude,
        fix.longitude,
      );

      if (
        distance <= config.stopRadiusMeters &&
        timeDiff <= config.maxTimeGapMinutes
      ) {
        cluster.push(fix);
        continue;
      }

      const stop = this.closeCluster(cluster, config);
      if (stop) {
        stops.push(stop);
      }
      cluster = [fix];
    }

    // Cerrar el último cluster en curso
    const lastStop = this.closeCluster(cluster, config);
    if (lastStop) {
      stops.push(lastStop);
    }

    return stops;
  }

  /**
   * Cierra un cluster: devuelve el stop o null si no alcanza la duración mínima
   */
  private closeCluster(
    cluster: readonly ILocationFix[],
    config: IStopDetectionConfig,
  ): IStop | null {
    const arrivalTime = cluster[0].timestamp;
    const departureTime = cluster[cluster.length - 1].timestamp;
    const durationMinutes =
      (departureTime.getTime() - arrivalTime.getTime()) / MS_PER_MINUTE;

    if (durationMinutes < config.minStopDurationMinutes) {
      return null;
    }

    const center = calculateCentroid(cluster);

    return {
      arrivalTime,
      departureTime,
      durationMinutes: Math.trunc(durationMinutes),
      latitude: roundTo(center.latitude, 6),
      longitude: roundTo(center.longitude, 6),
      pointCount: cluster.length,
    };
  }
}
