import { Module } from '@nestjs/common';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import {
  TimelineCsvService,
  MapHtmlService,
  FileHashService,
  ReportGeneratorService,
} from './services';

/**
 * Report Renderer
 * Artefactos: timeline.csv, map.html, action_log.txt, hashes.csv
 */
@Module({
  imports: [AuxiliaresModule],
  providers: [TimelineCsvService, MapHtmlService, FileHashService, ReportGeneratorService],
  exports: [ReportGeneratorService, MapHtmlService],
})
export class ReportsModule {}
