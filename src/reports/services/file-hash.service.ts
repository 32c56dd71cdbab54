import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { describeError, errorStack } from '../../common';
import { HASHES_COLUMNS, HASHES_FILENAME } from '../reports.constants';
import { CsvValue, toCsv } from '../utils';

/**
 * Hashes SHA-256 de los artefactos generados (integridad)
 */
@Injectable()
export class FileHashService {
  private readonly logger = new Logger(FileHashService.name);

  async calculateFileHash(filePath: string): Promise<string> {
    const hash = createHash('sha256');

    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }

    return hash.digest('hex');
  }

  /**
   * Escribe hashes.csv con una fila por archivo existente
   *
   * Si un hash falla se registra "ERROR" en su fila y se sigue.
   */
  async generateHashesCsv(files: readonly string[], outputDir: string): Promise<string> {
    const filePath = path.join(outputDir, HASHES_FILENAME);
    this.logger.log(`Generating ${HASHES_FILENAME}...`);

    try {
      const rows: CsvValue[][] = [];

      for (const file of files) {
        if (!(await this.exists(file))) {
          this.logger.warn(`Skipping missing file ${file}`);
          continue;
        }

        const filename = path.basename(file);
        const fileHash = await this.hashOrError(file);
        rows.push([filename, fileHash]);
        this.logger.log(`  - ${filename}: ${fileHash.slice(0, 16)}...`);
      }

      await fs.writeFile(filePath, toCsv(HASHES_COLUMNS, rows), 'utf8');
      this.logger.log(`Generated ${HASHES_FILENAME}`);
      return filePath;
    } catch (error) {
      this.logger.error(
        `Error generating ${HASHES_FILENAME}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }

  private async hashOrError(file: string): Promise<string> {
    try {
      return await this.calculateFileHash(file);
    } catch (error) {
      this.logger.error(`Error calculating hash for ${file}: ${describeError(error)}`);
      return 'ERROR';
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}
