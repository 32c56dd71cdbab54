import {
  IsArray,
  IsNumber,
  IsOptional,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

/**
 * Mayor timestamp representable por Date (±8.64e15 ms)
 */
export const MAX_TIMESTAMP_MS = 8.64e15;

/**
 * Fix GPS recibido por la API
 */
export class LocationFixDto {
  /**
   * Timestamp en milisegundos (Unix epoch)
   */
  @IsNumber()
  @Min(0)
  @Max(MAX_TIMESTAMP_MS)
  timestamp!: number;

  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;
}

/**
 * Body de POST /api/timeline/stops
 * Los umbrales son opcionales; si faltan se usan los del entorno.
 */
export class AnalyzeFixesDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LocationFixDto)
  fixes!: LocationFixDto[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  stopRadiusMeters?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  minStopDurationMinutes?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  maxTimeGapMinutes?: number;
}
