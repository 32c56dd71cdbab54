import { Injectable } from '@nestjs/common';
import { createInterface } from 'readline/promises';

/**
 * Pregunta en la terminal qué dispositivo usar cuando hay varios conectados
 */
@Injectable()
export class DevicePromptService {
  /**
   * Muestra la lista numerada y devuelve la respuesta cruda,
   * o null si el usuario cancela (Ctrl-C / fin de input)
   */
  async askForDevice(devices: readonly string[]): Promise<string | null> {
    devices.forEach((deviceId, i) => {
      process.stdout.write(`  ${i + 1}. ${deviceId}\n`);
    });

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const abort = new AbortController();
    rl.on('SIGINT', () => abort.abort());
    rl.on('close', () => abort.abort());

    try {
      const answer = await rl.question('Enter device number or ID: ', {
        signal: abort.signal,
      });
      return answer.trim();
    } catch (error) {
      if (abort.signal.aborted) {
        return null;
      }
      throw error;
    } finally {
      rl.close();
    }
  }
}
