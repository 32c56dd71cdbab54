import { DataSource, DataSourceOptions } from 'typeorm';
import { DB_LOGGING } from '../env';

export interface ISqliteDataSourceOptions {
  entities?: DataSourceOptions['entities'];
  synchronize?: boolean;
  readonly?: boolean;
}

/**
 * Crea un DataSource de TypeORM sobre un archivo SQLite (driver better-sqlite3)
 *
 * El archivo cambia en cada corrida (local o extraído del dispositivo),
 * por eso no se registra con TypeOrmModule.forRoot.
 */
export const createSqliteDataSource = (
  database: string,
  options: ISqliteDataSourceOptions = {},
): DataSource =>
  new DataSource({
    type: 'better-sqlite3',
    database,
    entities: options.entities ?? [],
    synchronize: options.synchronize ?? false,
    readonly: options.readonly ?? false,
    fileMustExist: options.readonly ?? false,
    logging: DB_LOGGING,
  });
