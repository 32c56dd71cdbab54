import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * Tabla de ubicaciones con el esquema de la base de ubicaciones de Android
 *
 * Solo se usa para generar bases de ejemplo; la lectura usa nombres de
 * tabla/columnas configurables (ver LocationDatabaseService).
 */
@Entity('locations')
export class LocationRecord {
  @PrimaryGeneratedColumn({ name: '_id' })
  id!: number;

  @Column({ type: 'integer' })
  @Index('idx_timestamp')
  timestamp!: number; // epoch en milisegundos

  @Column({ type: 'real' })
  latitude!: number;

  @Column({ type: 'real' })
  longitude!: number;

  @Column({ type: 'integer', nullable: true })
  accuracy!: number | null; // metros

  @Column({ type: 'real', nullable: true })
  altitude!: number | null;

  @Column({ type: 'real', nullable: true })
  speed!: number | null; // m/s

  @Column({ type: 'real', nullable: true })
  bearing!: number | null;

  @Column({ type: 'text', nullable: true })
  provider!: string | null; // 'gps' | 'network' | 'passive'
}
