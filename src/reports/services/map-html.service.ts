import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { IStop, StopDurationBand } from '../../models';
import { describeError, errorStack, formatUtcDateTimeShort } from '../../common';
import { DURATION_BAND_COLORS, MAP_CONFIG, MAP_FILENAME } from '../reports.constants';
import { classifyStopDuration, escapeHtml, toScriptJson } from '../utils';

/**
 * Marker de un stop tal como se incrusta en la página
 */
export interface IMapMarker {
  lat: number;
  lon: number;
  band: StopDurationBand;
  color: string;
  popup: string; // HTML ya escapado
  tooltip: string;
}

/**
 * Genera map.html: mapa Leaflet con un marker por stop (color según
 * duración) y una capa de calor ponderada por la duración
 */
@Injectable()
export class MapHtmlService {
  private readonly logger = new Logger(MapHtmlService.name);

  buildMarkers(stops: readonly IStop[]): IMapMarker[] {
    return stops.map((stop, i) => {
      const band = classifyStopDuration(stop.durationMinutes);
      const label = `Stop #${i + 1}`;

      const popup = [
        `<b>${escapeHtml(label)}</b>`,
        `Arrival: ${escapeHtml(formatUtcDateTimeShort(stop.arrivalTime))}`,
        `Departure: ${escapeHtml(formatUtcDateTimeShort(stop.departureTime))}`,
        `Duration: ${stop.durationMinutes} minutes`,
        `Location points: ${stop.pointCount}`,
      ].join('<br>');

      return {
        lat: stop.latitude,
        lon: stop.longitude,
        band,
        color: DURATION_BAND_COLORS[band],
        popup,
        tooltip: escapeHtml(`${label} (${stop.durationMinutes} min)`),
      };
    });
  }

  /**
   * Centro del mapa: promedio de los stops o el centro por defecto
   */
  mapCenter(stops: readonly IStop[]): [number, number] {
    if (stops.length === 0) {
      return [MAP_CONFIG.DEFAULT_CENTER[0], MAP_CONFIG.DEFAULT_CENTER[1]];
    }

    const lat = stops.reduce((sum, stop) => sum + stop.latitude, 0) / stops.length;
    const lon = stops.reduce((sum, stop) => sum + stop.longitude, 0) / stops.length;
    return [lat, lon];
  }

  renderMapHtml(stops: readonly IStop[]): string {
    const [centerLat, centerLon] = this.mapCenter(stops);
    const markers = this.buildMarkers(stops);
    const heatData = stops.map((stop) => [stop.latitude, stop.longitude, stop.durationMinutes]);
    const leaflet = `https://unpkg.com/leaflet@${MAP_CONFIG.LEAFLET_VERSION}/dist`;
    const leafletHeat = `https://unpkg.com/leaflet.heat@${MAP_CONFIG.LEAFLET_HEAT_VERSION}/dist`;

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>Location Timeline</title>
  <link rel="stylesheet" href="${leaflet}/leaflet.css" />
  <script src="${leaflet}/leaflet.js"></script>
  <script src="${leafletHeat}/leaflet-heat.js"></script>
  <style>
    html, body, #map { height: 100%; margin: 0; }
  </style>
</head>
<body>
  <div id="map"></div>
  <script>
    const markers = ${toScriptJson(markers)};
    const heatData = ${toScriptJson(heatData)};

    const map = L.map('map').setView([${centerLat}, ${centerLon}], ${MAP_CONFIG.ZOOM});
    L.tileLayer('https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png', {
      maxZoom: 19,
      attribution: '&copy; OpenStreetMap contributors',
    }).addTo(map);

    for (const marker of markers) {
      L.circleMarker([marker.lat, marker.lon], {
        radius: 9,
        color: marker.color,
        fillColor: marker.color,
        fillOpacity: 0.8,
      })
        .bindPopup(marker.popup, { maxWidth: ${MAP_CONFIG.POPUP_MAX_WIDTH} })
        .bindTooltip(marker.tooltip)
        .addTo(map);
    }

    if (heatData.length > 0) {
      L.heatLayer(heatData, { radius: ${MAP_CONFIG.HEAT_RADIUS}, blur: ${MAP_CONFIG.HEAT_BLUR} }).addTo(map);
    }
  </script>
</body>
</html>
`;
  }

  async generateMapHtml(stops: readonly IStop[], outputDir: string): Promise<string> {
    const filePath = path.join(outputDir, MAP_FILENAME);
    this.logger.log(`Generating ${MAP_FILENAME}...`);

    try {
      await fs.writeFile(filePath, this.renderMapHtml(stops), 'utf8');
      this.logger.log(`Generated ${MAP_FILENAME} with ${stops.length} markers and heatmap`);
      return filePath;
    } catch (error) {
      this.logger.error(
        `Error generating ${MAP_FILENAME}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
