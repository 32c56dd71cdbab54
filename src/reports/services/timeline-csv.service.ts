import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { IStop } from '../../models';
import { describeError, errorStack, formatUtcDateTime } from '../../common';
import { TIMELINE_COLUMNS, TIMELINE_FILENAME } from '../reports.constants';
import { CsvValue, toCsv } from '../utils';

@Injectable()
export class TimelineCsvService {
  private readonly logger = new Logger(TimelineCsvService.name);

  renderTimelineCsv(stops: readonly IStop[]): string {
    const rows: CsvValue[][] = stops.map((stop) => [
      formatUtcDateTime(stop.arrivalTime),
      formatUtcDateTime(stop.departureTime),
      stop.durationMinutes,
      stop.latitude,
      stop.longitude,
      stop.pointCount,
    ]);

    return toCsv(TIMELINE_COLUMNS, rows);
  }

  /**
   * Escribe timeline.csv (una fila por stop) y devuelve la ruta
   */
  async generateTimelineCsv(stops: readonly IStop[], outputDir: string): Promise<string> {
    const filePath = path.join(outputDir, TIMELINE_FILENAME);
    this.logger.log(`Generating ${TIMELINE_FILENAME}...`);

    try {
      await fs.writeFile(filePath, this.renderTimelineCsv(stops), 'utf8');
      this.logger.log(`Generated ${TIMELINE_FILENAME} with ${stops.length} stops`);
      return filePath;
    } catch (error) {
      this.logger.error(
        `Error generating ${TIMELINE_FILENAME}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
