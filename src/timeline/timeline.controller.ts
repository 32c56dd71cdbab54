import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { StopDetectorService } from '../detection/services';
import { ILocationFix, IStop } from '../models';
import { classifyStopDuration } from '../reports/utils';
import { AnalyzeFixesDto, StopResponseDto } from './dto';

/**
 * Detección de stops sobre fixes enviados por el cliente
 */
@Controller('api/timeline')
export class TimelineController {
  private readonly logger = new Logger(TimelineController.name);

  constructor(private readonly stopDetector: StopDetectorService) {}

  /**
   * POST /api/timeline/stops
   *
   * Body:
   * - fixes: { timestamp (ms), latitude, longitude }[]
   * - stopRadiusMeters, minStopDurationMinutes, maxTimeGapMinutes (opcionales)
   *
   * Ejemplo:
   * { "fixes": [{ "timestamp": 1705305600000, "latitude": 37.422, "longitude": -122.0841 }] }
   */
  @Post('stops')
  @HttpCode(HttpStatus.OK)
  detectStops(
    @Body(new ValidationPipe({ transform: true }))
    body: AnalyzeFixesDto,
  ): StopResponseDto[] {
    this.logger.log(`POST /api/timeline/stops - fixes=${body.fixes.length}`);

    if (body.fixes.length === 0) {
      this.logger.warn('No location fixes supplied; nothing to analyze.');
      return [];
    }

    const fixes: ILocationFix[] = body.fixes.map((fix) => ({
      timestamp: new Date(fix.timestamp),
      latitude: fix.latitude,
      longitude: fix.longitude,
    }));

    const stops = this.stopDetector.detectStops(fixes, {
      stopRadiusMeters: body.stopRadiusMeters,
      minStopDurationMinutes: body.minStopDurationMinutes,
      maxTimeGapMinutes: body.maxTimeGapMinutes,
    });

    if (stops.length === 0) {
      this.logger.warn(`No stops identified in ${fixes.length} location fixes.`);
    }

    return stops.map((stop) => this.toResponse(stop));
  }

  private toResponse(stop: IStop): StopResponseDto {
    return {
      arrivalTime: stop.arrivalTime.toISOString(),
      departureTime: stop.departureTime.toISOString(),
      durationMinutes: stop.durationMinutes,
      latitude: stop.latitude,
      longitude: stop.longitude,
      pointCount: stop.pointCount,
      durationBand: classifyStopDuration(stop.durationMinutes),
    };
  }
}
