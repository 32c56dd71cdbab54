import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { NODE_ENV } from '../../env';
import { describeError, formatLocalTimestamp, readField } from '../../common';

/**
 * Action log de la corrida
 *
 * Se instala como logger de la aplicación (app.useLogger), así cada
 * `Logger` de los colaboradores queda registrado. log/warn/error se guardan
 * para action_log.txt solo entre startRun() y stopRun(); fuera de una corrida
 * (p. ej. en modo serve) se imprimen sin acumularse. debug/verbose solo se
 * imprimen en development.
 */
@Injectable()
export class ActionLogService implements NestLoggerService {
  private readonly entries: string[] = [];
  private recording = false;

  /**
   * Descarta lo registrado y empieza a acumular entradas
   */
  startRun(): void {
    this.entries.length = 0;
    this.recording = true;
  }

  stopRun(): void {
    this.recording = false;
  }

  /**
   * Registra un mensaje con timestamp local y devuelve la línea guardada
   */
  record(message: string): string {
    const entry = this.stamp(message);
    this.entries.push(entry);
    return entry;
  }

  getEntries(): readonly string[] {
    return this.entries;
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    const entry = this.capture(this.stringify(message));
    console.log(this.withContext(entry, optionalParams));
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    const entry = this.capture(this.stringify(message));
    console.error(this.withContext(entry, optionalParams));

    // Nest llama error(message, stack, context)
    const [stack] = optionalParams;
    if (optionalParams.length > 1 && typeof stack === 'string') {
      console.error(stack);
    }
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    const entry = this.capture(this.stringify(message));
    console.warn(this.withContext(entry, optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    if (NODE_ENV === 'development') {
      console.debug(this.withContext(`[DEBUG] ${this.stringify(message)}`, optionalParams));
    }
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    if (NODE_ENV === 'development') {
      console.log(this.withContext(`[VERBOSE] ${this.stringify(message)}`, optionalParams));
    }
  }

  private capture(message: string): string {
    return this.recording ? this.record(message) : this.stamp(message);
  }

  private stamp(message: string): string {
    return `[${formatLocalTimestamp(this.now())}] ${message}`;
  }

  protected now(): Date {
    return new Date();
  }

  private stringify(message: unknown): string {
    if (typeof message === 'string') return message;
    if (typeof readField(message, 'message') === 'string') return describeError(message);
    return JSON.stringify(message) ?? String(message);
  }

  /**
   * El contexto (nombre de la clase) llega como último parámetro
   */
  private withContext(line: string, optionalParams: unknown[]): string {
    const context = optionalParams[optionalParams.length - 1];
    return typeof context === 'string' && context.length > 0
      ? `[${context}] ${line}`
      : line;
  }
}
