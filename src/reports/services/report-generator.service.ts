import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { IStop } from '../../models';
import { describeError, errorStack, formatLocalTimestamp } from '../../common';
import { ActionLogService } from '../../auxiliares/logger/action-log.service';
import { ACTION_LOG_FILENAME } from '../reports.constants';
import { TimelineCsvService } from './timeline-csv.service';
import { MapHtmlService } from './map-html.service';
import { FileHashService } from './file-hash.service';

export interface IReportArtifacts {
  timelinePath: string;
  mapPath: string;
  actionLogPath: string;
  hashesPath: string;
}

const ACTION_LOG_TITLE = 'Location Timeline Extractor - Detailed Action Log';
const RULE = '='.repeat(70);
const BANNER = '='.repeat(50);

/**
 * Report Renderer: genera todos los artefactos de una corrida
 *
 * Orden: timeline.csv → map.html → action_log.txt → hashes.csv
 * (los hashes cubren los tres anteriores)
 */
@Injectable()
export class ReportGeneratorService {
  private readonly logger = new Logger(ReportGeneratorService.name);

  constructor(
    private readonly timelineCsv: TimelineCsvService,
    private readonly mapHtml: MapHtmlService,
    private readonly fileHash: FileHashService,
    private readonly actionLog: ActionLogService,
  ) {}

  async generateAllOutputs(
    stops: readonly IStop[],
    outputDir: string,
  ): Promise<IReportArtifacts> {
    this.logger.log(BANNER);
    this.logger.log('Starting output file generation');
    this.logger.log(BANNER);

    const timelinePath = await this.timelineCsv.generateTimelineCsv(stops, outputDir);
    const mapPath = await this.mapHtml.generateMapHtml(stops, outputDir);
    const actionLogPath = await this.generateActionLog(outputDir);
    const hashesPath = await this.fileHash.generateHashesCsv(
      [timelinePath, mapPath, actionLogPath],
      outputDir,
    );

    this.logger.log(BANNER);
    this.logger.log('All output files generated successfully!');
    this.logger.log(`Output directory: ${path.resolve(outputDir)}`);
    this.logger.log(BANNER);

    return { timelinePath, mapPath, actionLogPath, hashesPath };
  }

  /**
   * Vuelca las entradas registradas hasta ahora en action_log.txt
   */
  async generateActionLog(outputDir: string, now: Date = new Date()): Promise<string> {
    const filePath = path.join(outputDir, ACTION_LOG_FILENAME);
    this.logger.log(`Generating ${ACTION_LOG_FILENAME}...`);

    // Sin milisegundos en el encabezado y el cierre
    const stamp = formatLocalTimestamp(now).slice(0, 19);
    const content =
      `${ACTION_LOG_TITLE}\n${RULE}\nGenerated at: ${stamp}\n${RULE}\n\n` +
      this.actionLog.getEntries().map((entry) => `${entry}\n`).join('') +
      `\n[${stamp}] Action log completed.`;

    try {
      await fs.writeFile(filePath, content, 'utf8');
      this.logger.log(`Generated ${ACTION_LOG_FILENAME}`);
      return filePath;
    } catch (error) {
      this.logger.error(
        `Error generating ${ACTION_LOG_FILENAME}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
