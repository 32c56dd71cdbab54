/**
 * Resultado de copiar un archivo del dispositivo a disco local
 */
export interface IPullResult {
  pulled: boolean;

  /**
   * Motivo de la falla:
   * - not_accessible: permisos o ruta inexistente (típico sin root)
   * - error: el bridge reportó un error
   * - unexpected_output: terminó sin error pero no confirmó la copia
   */
  reason?: 'not_accessible' | 'error' | 'unexpected_output';
  detail?: string;
}

/**
 * Capacidad de acceso a dispositivos
 *
 * Oculta el bridge concreto (adb) y su parsing de salida.
 */
export interface IDeviceRepository {
  /**
   * IDs de dispositivos conectados y autorizados; [] si no hay o si falla
   */
  listDevices(): Promise<string[]>;

  /**
   * Rutas remotas que podrían contener la tabla de ubicaciones
   */
  listCandidateDatabases(deviceId: string): Promise<string[]>;

  pullFile(deviceId: string, remotePath: string, localPath: string): Promise<IPullResult>;
}
