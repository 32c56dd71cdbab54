import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { ADB_PATH } from '../../env';
import { describeError, errorCode, readField } from '../../common';

const execFileAsync = promisify(execFile);

export interface IAdbCommandResult {
  ok: boolean;
  stdout: string;
  stderr: string; // en fallas contiene el mensaje de error armado
}

const asText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

/**
 * Ejecuta comandos `adb`
 *
 * No lanza: toda falla (binario ausente, exit code != 0, error inesperado)
 * vuelve como `ok: false` con el motivo en stderr.
 */
@Injectable()
export class AdbCommandService {
  private readonly logger = new Logger(AdbCommandService.name);

  private readonly adbPath = ADB_PATH;

  async run(args: string[]): Promise<IAdbCommandResult> {
    this.logger.debug(`${this.adbPath} ${args.join(' ')}`);

    try {
      const { stdout, stderr } = await execFileAsync(this.adbPath, args, {
        encoding: 'utf8',
      });
      return { ok: true, stdout: stdout.trim(), stderr: stderr.trim() };
    } catch (error) {
      return { ok: false, stdout: '', stderr: this.describeFailure(args, error) };
    }
  }

  private describeFailure(args: string[], error: unknown): string {
    const code = errorCode(error);

    if (code === 'ENOENT') {
      return "Error: ADB not found. Please ensure ADB is installed and in your system's PATH.";
    }

    if (typeof code === 'number') {
      const output = asText(readField(error, 'stderr')) || asText(readField(error, 'stdout'));
      return (
        `ADB Command Error: '${this.adbPath} ${args.join(' ')}' failed with exit code ${code}.` +
        `\n${output}`
      );
    }

    return `An unexpected error occurred while running ADB command: ${describeError(error)}`;
  }
}
